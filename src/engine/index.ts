/* ------------------------------------------------- */
/* File: src/engine/index.ts                         */
/* ------------------------------------------------- */
import { BattleshipError, ErrorCode } from "../errors.js";
import type { ProtocolMessage } from "../net/protocol.js";
import { Battlefield } from "./battlefield.js";
import { applyShotResult, resolveIncomingShot } from "./combat.js";
import { OPPOSITE_DIRECTION } from "./movement.js";
import { Direction, Logger } from "./types.js";

export interface MessageSender {
  send(message: ProtocolMessage): Promise<void>;
}

/* ---- commande envoyée, en attente de la réponse du serveur ---- */
type PendingCommand = { t: "shoot"; x: number; y: number } | { t: "move_ship"; shipId: number; direction: Direction };

export interface PlayerState {
  phase: "lobby" | "placing" | "playing" | "over";
  opponent: string | null;
  /** taille de grille annoncée par le serveur */
  matchLength: number | null;
  myTurn: boolean;
  awaitingResult: boolean;
  outcome: "won" | "lost" | null;
  lastError: { code: ErrorCode; msg: string } | null;
}

/**
 * Moteur côté client autour d'un Battlefield. `onMessage` se branche sur la
 * ClientSession ; `fire` et `moveShip` envoient les commandes.
 */
export function createPlayerEngine(session: MessageSender, battlefield: Battlefield, logger: Logger = console) {
  const state: PlayerState = {
    phase: "lobby",
    opponent: null,
    matchLength: null,
    myTurn: false,
    awaitingResult: false,
    outcome: null,
    lastError: null,
  };
  let pending: PendingCommand | null = null;

  /* ---- le serveur a refusé la dernière commande : on la défait ---- */
  function rollback(code: ErrorCode): void {
    const command = pending;
    pending = null;
    if (!command) return;

    if (command.t === "move_ship" && !battlefield.move(command.shipId, OPPOSITE_DIRECTION[command.direction])) {
      logger.error(`[ENGINE] Could not undo move of ship ${command.shipId}`);
    }
    state.myTurn = state.phase === "playing" && code !== "NOT_YOUR_TURN";
  }

  async function onMessage(message: ProtocolMessage): Promise<void> {
    switch (message.t) {
      case "matched":
        state.phase = "placing";
        state.opponent = message.opponent;
        state.matchLength = message.length;
        if (message.length !== battlefield.length) {
          state.lastError = {
            code: "INVALID_PLACEMENT",
            msg: `Match is played on ${message.length}x${message.length}, local grid is ${battlefield.length}x${battlefield.length}`,
          };
          logger.warn(`[ENGINE] ${state.lastError.msg}`);
        }
        return;

      case "start":
        state.phase = "playing";
        state.myTurn = message.yourTurn;
        return;

      case "turn":
        pending = null;
        state.myTurn = message.yourTurn;
        return;

      case "shoot": {
        const report = resolveIncomingShot(battlefield, message.x, message.y);
        await session.send({ t: "shot_result", x: message.x, y: message.y, ...report });
        return;
      }

      case "shot_result":
        applyShotResult(battlefield, message.x, message.y, message.hit);
        pending = null;
        state.awaitingResult = false;
        return;

      case "game_over":
        state.phase = "over";
        pending = null;
        state.myTurn = false;
        state.outcome = message.won ? "won" : "lost";
        return;

      case "error":
        state.lastError = { code: message.code, msg: message.msg };
        state.awaitingResult = false;
        rollback(message.code);
        logger.warn(`[ENGINE] Server rejected a request: ${message.code} ${message.msg}`);
        return;

      default:
        return;
    }
  }

  function canAct(): boolean {
    return state.phase === "playing" && state.myTurn && !state.awaitingResult;
  }

  async function fire(x: number, y: number): Promise<boolean> {
    if (!canAct() || !battlefield.shoot(x, y)) return false;
    state.awaitingResult = true;
    state.myTurn = false;
    pending = { t: "shoot", x, y };
    await session.send({ t: "shoot", x, y });
    return true;
  }

  async function moveShip(shipId: number, direction: Direction): Promise<boolean> {
    if (!canAct() || !battlefield.move(shipId, direction)) return false;
    state.myTurn = false;
    pending = { t: "move_ship", shipId, direction };
    await session.send({ t: "move_ship", shipId, direction });
    return true;
  }

  async function placeShips(): Promise<void> {
    if (state.matchLength !== null && state.matchLength !== battlefield.length) {
      throw BattleshipError.invalidPlacement(
        `Fleet was laid out on ${battlefield.length}x${battlefield.length}, match uses ${state.matchLength}x${state.matchLength}`,
        { length: battlefield.length, matchLength: state.matchLength },
      );
    }
    await session.send({ t: "place_ships", ships: battlefield.ships.map(s => s.toPlacement()) });
  }

  return {
    state,
    battlefield,
    onMessage,
    fire,
    moveShip,
    placeShips,
  };
}

export type PlayerEngine = ReturnType<typeof createPlayerEngine>;
