export * from "./errors.js";
export * from "./config.js";

export * from "./engine/types.js";
export * from "./engine/movement.js";
export * from "./engine/ship.js";
export * from "./engine/battlefield.js";
export * from "./engine/fleet.js";
export * from "./engine/combat.js";
export * from "./engine/index.js";

export * from "./net/protocol.js";
export * from "./net/codec.js";
export * from "./net/transport.js";
export * from "./net/session.js";
export * from "./net/server.js";
export * from "./net/client.js";

export * from "./lobby/match.js";
export * from "./lobby/lobby.js";
