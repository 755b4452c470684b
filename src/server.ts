import { loadConfig } from "./config.js";
import { Lobby } from "./lobby/lobby.js";
import { SessionServer } from "./net/server.js";

/* ------------------------------------------------------------------ */
/*  Configuration : lue une fois, au démarrage                        */
/* ------------------------------------------------------------------ */
const SERVER_CONFIG = loadConfig();

/* ------------------------------------------------------------------ */
/*  Lobby + registre des connexions                                   */
/* ------------------------------------------------------------------ */
const lobby = new Lobby({ length: SERVER_CONFIG.GAME.BATTLEFIELD_LENGTH });

const server = new SessionServer({
  host: SERVER_CONFIG.SERVER.HOST,
  port: SERVER_CONFIG.SERVER.PORT,
  pingIntervalMs: SERVER_CONFIG.SERVER.PING_INTERVAL_MS,
  maxFrameBytes: SERVER_CONFIG.PROTOCOL.MAX_FRAME_BYTES,
  onClientConnected: lobby.handleConnect,
});

/* ------------------------------------------------------------------ */
/*  Lancement                                                         */
/* ------------------------------------------------------------------ */
await server.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.log(`🛑  ${signal} received, shutting down`);
    server
      .shutdown()
      .then(() => process.exit(0))
      .catch(err => {
        console.error("[SERVER] Shutdown failed:", err);
        process.exit(1);
      });
  });
}
