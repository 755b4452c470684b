/* ------------------------------------------------- */
/* File: src/net/protocol.ts                         */
/* ------------------------------------------------- */
import { z } from "zod";

import { DIRECTIONS, ORIENTATIONS, SHIP_TYPES } from "../engine/types.js";
import { ERROR_CODES } from "../errors.js";

/** évènement socket.io qui transporte les trames brutes */
export const FRAME_EVENT = "frame";

const MAX_COORDINATE = 255;

const CoordinateSchema = z.number().int().min(0).max(MAX_COORDINATE);
const ShipIdSchema = z.number().int().nonnegative();

export const ShipPlacementSchema = z.object({
  id: ShipIdSchema,
  type: z.enum(SHIP_TYPES),
  x: CoordinateSchema,
  y: CoordinateSchema,
  orientation: z.enum(ORIENTATIONS),
});

/* ---- messages, discriminés par `t` ---- */
export const ProtocolMessageSchema = z.discriminatedUnion("t", [
  z.object({ t: z.literal("login"), username: z.string().max(64) }),
  z.object({ t: z.literal("login_ok"), clientId: z.number().int().positive() }),
  z.object({
    t: z.literal("matched"),
    opponent: z.string(),
    length: z.number().int().positive(),
  }),
  z.object({ t: z.literal("place_ships"), ships: z.array(ShipPlacementSchema).max(32) }),
  z.object({ t: z.literal("start"), yourTurn: z.boolean() }),
  z.object({ t: z.literal("shoot"), x: CoordinateSchema, y: CoordinateSchema }),
  z.object({
    t: z.literal("shot_result"),
    x: CoordinateSchema,
    y: CoordinateSchema,
    hit: z.boolean(),
    sunk: z.boolean(),
    fleetDestroyed: z.boolean(),
  }),
  z.object({ t: z.literal("move_ship"), shipId: ShipIdSchema, direction: z.enum(DIRECTIONS) }),
  z.object({ t: z.literal("turn"), yourTurn: z.boolean() }),
  z.object({
    t: z.literal("game_over"),
    won: z.boolean(),
    reason: z.enum(["fleet_destroyed", "opponent_left"]),
  }),
  z.object({ t: z.literal("error"), code: z.enum(ERROR_CODES), msg: z.string() }),
]);

export type ProtocolMessage = z.infer<typeof ProtocolMessageSchema>;
export type MessageKind = ProtocolMessage["t"];
export type MessageOf<K extends MessageKind> = Extract<ProtocolMessage, { t: K }>;
