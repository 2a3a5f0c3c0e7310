/**
 * Ordered candidate tables for resolving who a USERNOTICE is about. Different notice
 * subtypes (resubs, gifts, community gifts, upgrades) put the user under different
 * tag keys; the lists below are tried front to back. Extend them here.
 */

export type Tags = Record<string, string>;

/** Returns a name from the tags, or undefined to let the next candidate run. */
export type NameCandidate = (tags: Tags) => string | undefined;

export const NOTICE_LOGIN_KEYS: readonly string[] = [
  "login",
  "msg-param-sender-login",
  "msg-param-gifter-login",
  "msg-param-recipient-login",
  "msg-param-recipient-user-login",
  "msg-param-user-login"
];

export const NOTICE_DISPLAY_NAME_KEYS: readonly string[] = [
  "display-name",
  "msg-param-sender-display-name",
  "msg-param-gifter-display-name",
  "msg-param-recipient-display-name",
  "msg-param-recipient-user-name"
];

export const SUBSCRIPTION_RECIPIENT_KEYS: readonly string[] = [
  "msg-param-recipient-display-name",
  "msg-param-recipient-user-name",
  "msg-param-recipient-login",
  "msg-param-recipient-user-login"
];

export const fromTagKeys =
  (keys: readonly string[]): NameCandidate =>
  (tags) =>
    keys.map((key) => tags[key]).find((value) => Boolean(value));

const LEADING_NAME = /^([\w\u00C0-\u017F'-]+)/;

/** Last resort: the first word of `system-msg` once markup and common entities are removed. */
export const firstWordOfSystemMessage: NameCandidate = (tags) => {
  const plain = (tags["system-msg"] ?? "")
    .replace(/<[^>]*>/g, "")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .trim();
  return LEADING_NAME.exec(plain)?.[1];
};

export const firstCandidate = (candidates: readonly NameCandidate[], tags: Tags): string | undefined => {
  for (const candidate of candidates) {
    const value = candidate(tags);
    if (value) return value;
  }
  return undefined;
};

export type NoticeAuthor = {
  login?: string;
  name?: string;
};

export const resolveNoticeAuthor = (tags: Tags, isSubscription: boolean): NoticeAuthor => {
  const login = firstCandidate([fromTagKeys(NOTICE_LOGIN_KEYS)], tags);
  const nameCandidates: NameCandidate[] = [fromTagKeys(NOTICE_DISPLAY_NAME_KEYS), () => login];
  if (isSubscription) {
    nameCandidates.push(fromTagKeys(SUBSCRIPTION_RECIPIENT_KEYS), firstWordOfSystemMessage);
  }
  return { login, name: firstCandidate(nameCandidates, tags) };
};
