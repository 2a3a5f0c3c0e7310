import type { AddressInfo } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocketServer } from "ws";
import { createWebSocket, type ChatSocket } from "../src/socket";

describe("createWebSocket", () => {
  let server: WebSocketServer;
  let url: string;

  beforeEach(async () => {
    server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    server.on("connection", (client) => {
      client.on("message", (data) => client.send(`echo:${data.toString()}`));
    });
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address: AddressInfo | string = server.address();
    if (typeof address === "string") throw new Error(`Unexpected server address ${address}`);
    url = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("delivers text frames and close events through the handlers", async () => {
    const received: string[] = [];
    let socket: ChatSocket | null = null;

    const closed = new Promise<number>((resolve, reject) => {
      socket = createWebSocket(url, {
        onOpen: () => {
          socket?.send("PING");
        },
        onMessage: (data) => {
          received.push(data);
          socket?.close(1000, "done");
        },
        onClose: (code) => resolve(code),
        onError: reject
      });
    });

    await expect(closed).resolves.toBe(1000);
    expect(received).toEqual(["echo:PING"]);
  });

  it("terminates without a close handshake", async () => {
    let socket: ChatSocket | null = null;

    const closed = new Promise<number>((resolve, reject) => {
      socket = createWebSocket(url, {
        onOpen: () => {
          socket?.terminate();
        },
        onMessage: () => {},
        onClose: (code) => resolve(code),
        onError: reject
      });
    });

    await expect(closed).resolves.toBe(1006);
  });
});
