import WebSocket from "ws";

export type SocketHandlers = {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
};

export type ChatSocket = {
  isOpen: () => boolean;
  send: (data: string) => void;
  close: (code?: number, reason?: string) => void;
  /** Drops the connection without waiting for the close handshake. */
  terminate: () => void;
};

export type SocketFactory = (url: string, handlers: SocketHandlers) => ChatSocket;

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
};

export const createWebSocket: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);

  socket.on("open", handlers.onOpen);
  socket.on("message", (data) => handlers.onMessage(rawDataToString(data)));
  socket.on("close", (code, reason) => handlers.onClose(code, reason.toString("utf8")));
  socket.on("error", handlers.onError);

  return {
    isOpen: () => socket.readyState === WebSocket.OPEN,
    send: (data) => socket.send(data),
    close: (code, reason) => socket.close(code, reason),
    terminate: () => socket.terminate()
  };
};
