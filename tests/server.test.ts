import { afterEach, describe, expect, it, vi } from "vitest";

import { BattleshipError } from "../src/errors.js";
import { ClientSession } from "../src/net/client.js";
import type { ProtocolMessage } from "../src/net/protocol.js";
import { ClientConnectedHandler, ServerClient, SessionServer } from "../src/net/server.js";
import { silentLogger } from "./support/memory-transport.js";

const servers: SessionServer[] = [];
const clients: ClientSession[] = [];

afterEach(async () => {
  for (const client of clients.splice(0)) client.close();
  for (const server of servers.splice(0)) await server.shutdown();
});

async function startServer(onClientConnected: ClientConnectedHandler): Promise<{ server: SessionServer; url: string }> {
  const server = new SessionServer({ host: "127.0.0.1", port: 0, onClientConnected, logger: silentLogger });
  servers.push(server);
  await server.start();
  const bound = server.address();
  if (!bound) throw new Error("server did not bind");
  return { server, url: `http://127.0.0.1:${bound.port}` };
}

async function connect(url: string, onMessage: (m: ProtocolMessage) => Promise<void> = async () => {}, onDisconnect = vi.fn()) {
  const client = new ClientSession(url, onMessage, onDisconnect, { logger: silentLogger });
  clients.push(client);
  await client.connect();
  return { client, onDisconnect };
}

/** Records everything per client id and echoes each message back. */
function echoRegistry() {
  const connected: ServerClient[] = [];
  const received = new Map<number, ProtocolMessage[]>();
  const disconnects = new Map<number, number>();

  const handler: ClientConnectedHandler = client => {
    connected.push(client);
    received.set(client.id, []);
    return {
      onMessage: async message => {
        received.get(client.id)?.push(message);
        await client.send(message);
      },
      onDisconnect: () => {
        disconnects.set(client.id, (disconnects.get(client.id) ?? 0) + 1);
      },
    };
  };
  return { handler, connected, received, disconnects };
}

describe("SessionServer", () => {
  it("assigns increasing ids and tracks live clients", async () => {
    const registry = echoRegistry();
    const { server, url } = await startServer(registry.handler);

    await connect(url);
    await connect(url);
    await vi.waitFor(() => expect(server.clients.size).toBe(2));

    expect(registry.connected.map(c => c.id)).toEqual([1, 2]);
    expect([...server.clients.keys()]).toEqual([1, 2]);
  });

  it("drops its connection listeners once connected", async () => {
    const { url } = await startServer(echoRegistry().handler);
    const { client } = await connect(url);

    const socket = client["socket"];
    expect(socket?.listeners("connect")).toHaveLength(0);
    expect(socket?.listeners("connect_error")).toHaveLength(0);
    expect(socket?.listeners("disconnect")).toHaveLength(1);
  });

  it("echoes messages through the session", async () => {
    const registry = echoRegistry();
    const { url } = await startServer(registry.handler);
    const echoed: ProtocolMessage[] = [];

    const { client } = await connect(url, async m => {
      echoed.push(m);
    });
    await client.send({ t: "shoot", x: 4, y: 2 });

    await vi.waitFor(() => expect(echoed).toEqual([{ t: "shoot", x: 4, y: 2 }]));
    expect(registry.received.get(1)).toEqual([{ t: "shoot", x: 4, y: 2 }]);
  });

  it("keeps each connection's messages in order when two clients interleave", async () => {
    const registry = echoRegistry();
    const { url } = await startServer(registry.handler);
    const { client: first } = await connect(url);
    const { client: second } = await connect(url);

    const fromFirst: ProtocolMessage[] = Array.from({ length: 100 }, (_, i) => ({
      t: "shoot",
      x: i % 10,
      y: Math.floor(i / 10),
    }));
    const fromSecond: ProtocolMessage[] = Array.from({ length: 100 }, (_, i) => ({
      t: "move_ship",
      shipId: i,
      direction: i % 2 === 0 ? "up" : "down",
    }));

    for (let i = 0; i < 100; i++) {
      if (i % 7 < 3) {
        await first.send(fromFirst[i]);
        await second.send(fromSecond[i]);
      } else {
        await second.send(fromSecond[i]);
        await first.send(fromFirst[i]);
      }
    }

    await vi.waitFor(() => {
      expect(registry.received.get(1)).toHaveLength(100);
      expect(registry.received.get(2)).toHaveLength(100);
    });
    expect(registry.received.get(1)).toEqual(fromFirst);
    expect(registry.received.get(2)).toEqual(fromSecond);
  });

  it("removes the client and notifies once when the client leaves", async () => {
    const registry = echoRegistry();
    const { server, url } = await startServer(registry.handler);
    const { client, onDisconnect } = await connect(url);
    await vi.waitFor(() => expect(server.clients.size).toBe(1));

    client.close();
    await client.closed;

    await vi.waitFor(() => expect(registry.disconnects.get(1)).toBe(1));
    expect(server.clients.size).toBe(0);
    expect(onDisconnect).toHaveBeenCalledTimes(1);
  });

  it("tells the client once when the server closes its session", async () => {
    const { url } = await startServer(client => ({
      onMessage: async () => {
        client.close();
      },
      onDisconnect: () => {},
    }));
    const { client, onDisconnect } = await connect(url);

    await client.send({ t: "login", username: "bye" });

    await vi.waitFor(() => expect(onDisconnect).toHaveBeenCalledTimes(1));
    expect(client.state).toBe("closed");
    await expect(client.send({ t: "login", username: "again" })).rejects.toThrow("Cannot send login");
  });

  it("refuses a client whose setup callback throws", async () => {
    const { server, url } = await startServer(() => {
      throw new Error("lobby full");
    });
    const { onDisconnect } = await connect(url);

    await vi.waitFor(() => expect(onDisconnect).toHaveBeenCalledTimes(1));
    expect(server.clients.size).toBe(0);
  });

  it("stops accepting on stop() but keeps live sessions", async () => {
    const registry = echoRegistry();
    const { server, url } = await startServer(registry.handler);
    const echoed: ProtocolMessage[] = [];
    const { client } = await connect(url, async m => {
      echoed.push(m);
    });

    await server.stop();
    expect(server.listening).toBe(false);

    const late = new ClientSession(url, async () => {}, () => {}, { logger: silentLogger, timeoutMs: 2_000 });
    clients.push(late);
    await expect(late.connect()).rejects.toBeInstanceOf(BattleshipError);

    await client.send({ t: "turn", yourTurn: true });
    await vi.waitFor(() => expect(echoed).toEqual([{ t: "turn", yourTurn: true }]));
  });

  it("reports live clients on /health", async () => {
    const registry = echoRegistry();
    const { url } = await startServer(registry.handler);
    await connect(url);
    await vi.waitFor(() => expect(registry.connected).toHaveLength(1));

    const res = await fetch(`${url}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", clients: 1 });
  });

  it("fails to connect with CONNECTION_FAILED when nothing listens", async () => {
    const { server, url } = await startServer(echoRegistry().handler);
    await server.shutdown();

    const client = new ClientSession(url, async () => {}, () => {}, { logger: silentLogger, timeoutMs: 2_000 });
    clients.push(client);

    await expect(client.connect()).rejects.toMatchObject({ code: "CONNECTION_FAILED" });
  });
});
