export class ChatConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChatConnectionError";
  }
}

export class HelixRequestError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(source: string, status: number, body: string) {
    super(`${source} request failed (${status}).`);
    this.name = "HelixRequestError";
    this.status = status;
    this.body = body;
  }
}
