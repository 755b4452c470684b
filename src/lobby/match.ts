/* ------------------------------------------------- */
/* File: src/lobby/match.ts                          */
/* ------------------------------------------------- */
import { Battlefield } from "../engine/battlefield.js";
import { buildFleet } from "../engine/fleet.js";
import type { Logger } from "../engine/types.js";
import { BattleshipError, ConnectionClosedError, ErrorCode } from "../errors.js";
import type { MessageOf, ProtocolMessage } from "../net/protocol.js";
import type { ServerClient } from "../net/server.js";

export interface MatchPlayer {
  readonly client: ServerClient;
  readonly username: string;
}

interface Seat {
  player: MatchPlayer;
  /** copie de la flotte du joueur (validation des tirs et déplacements) */
  field: Battlefield | null;
}

type Phase = "placing" | "playing" | "over";
type SeatIndex = 0 | 1;

export type MatchMessage = MessageOf<"place_ships" | "shoot" | "shot_result" | "move_ship">;

export async function safeSend(client: ServerClient, message: ProtocolMessage, logger: Logger): Promise<void> {
  try {
    await client.send(message);
  } catch (err) {
    if (!(err instanceof ConnectionClosedError)) throw err;
    logger.warn(`[LOBBY] Dropped ${message.t} for client #${client.id}: ${err.message}`);
  }
}

/**
 * Deux joueurs appariés. Le serveur relaie les tirs et tient le tour ;
 * chaque client décide lui-même si un tir touche.
 */
export class Match {
  private phase: Phase = "placing";
  private turn: SeatIndex = 0;
  private pendingShot: { x: number; y: number } | null = null;
  private readonly seats: [Seat, Seat];

  constructor(
    first: MatchPlayer,
    second: MatchPlayer,
    readonly length: number,
    private readonly logger: Logger = console,
  ) {
    this.seats = [
      { player: first, field: null },
      { player: second, field: null },
    ];
  }

  get currentPhase(): Phase {
    return this.phase;
  }

  get players(): readonly MatchPlayer[] {
    return this.seats.map(s => s.player);
  }

  async announce(): Promise<void> {
    const [a, b] = this.seats;
    this.logger.log(`[LOBBY] Match ${a.player.username} vs ${b.player.username}`);
    await Promise.all([
      this.send(0, { t: "matched", opponent: b.player.username, length: this.length }),
      this.send(1, { t: "matched", opponent: a.player.username, length: this.length }),
    ]);
  }

  async handle(clientId: number, message: MatchMessage): Promise<void> {
    const index = this.seatOf(clientId);
    if (index === null) return;

    switch (message.t) {
      case "place_ships":
        return this.placeShips(index, message);
      case "shoot":
        return this.shoot(index, message);
      case "shot_result":
        return this.shotResult(index, message);
      case "move_ship":
        return this.moveShip(index, message);
    }
  }

  /** départ d'un joueur : l'adversaire gagne, sauf partie finie */
  async leave(clientId: number): Promise<void> {
    const index = this.seatOf(clientId);
    if (index === null || this.phase === "over") return;

    this.phase = "over";
    await this.send(other(index), { t: "game_over", won: true, reason: "opponent_left" });
  }

  /* ---- placement ---- */
  private async placeShips(index: SeatIndex, message: MessageOf<"place_ships">): Promise<void> {
    if (this.phase !== "placing") {
      return this.reject(index, "UNEXPECTED_MESSAGE", "Ships can only be placed before the battle starts");
    }
    if (message.ships.length === 0) {
      return this.reject(index, "INVALID_PLACEMENT", "A fleet needs at least one ship");
    }

    try {
      this.seats[index].field = new Battlefield(this.length, buildFleet(message.ships, this.length), this.logger);
    } catch (err) {
      if (err instanceof BattleshipError) return this.reject(index, "INVALID_PLACEMENT", err.message);
      throw err;
    }

    if (this.seats.every(s => s.field !== null)) {
      this.phase = "playing";
      await Promise.all([
        this.send(0, { t: "start", yourTurn: this.turn === 0 }),
        this.send(1, { t: "start", yourTurn: this.turn === 1 }),
      ]);
    }
  }

  /* ---- tirs ---- */
  private async shoot(index: SeatIndex, message: MessageOf<"shoot">): Promise<void> {
    const field = this.activeField(index);
    if (!field) return this.reject(index, "UNEXPECTED_MESSAGE", "The battle has not started");
    if (index !== this.turn) return this.reject(index, "NOT_YOUR_TURN", "Wait for your turn");
    if (this.pendingShot) return this.reject(index, "UNEXPECTED_MESSAGE", "Previous shot not resolved yet");
    if (!field.shoot(message.x, message.y)) {
      return this.reject(index, "INVALID_SHOT", `Cannot shoot at (${message.x}, ${message.y})`);
    }

    this.pendingShot = { x: message.x, y: message.y };
    await this.send(other(index), { t: "shoot", x: message.x, y: message.y });
  }

  private async shotResult(index: SeatIndex, message: MessageOf<"shot_result">): Promise<void> {
    const shot = this.pendingShot;
    if (this.phase !== "playing" || index === this.turn || !shot || shot.x !== message.x || shot.y !== message.y) {
      return this.reject(index, "UNEXPECTED_MESSAGE", "No matching shot to report on");
    }

    const shooter = this.turn;
    this.pendingShot = null;
    this.seats[shooter].field?.recordShot(message.x, message.y, message.hit);
    await this.send(shooter, message);

    if (message.fleetDestroyed) {
      this.phase = "over";
      this.logger.log(`[LOBBY] ${this.seats[shooter].player.username} won`);
      await Promise.all([
        this.send(shooter, { t: "game_over", won: true, reason: "fleet_destroyed" }),
        this.send(index, { t: "game_over", won: false, reason: "fleet_destroyed" }),
      ]);
      return;
    }
    await this.passTurn();
  }

  /* ---- déplacements ---- */
  private async moveShip(index: SeatIndex, message: MessageOf<"move_ship">): Promise<void> {
    const field = this.activeField(index);
    if (!field) return this.reject(index, "UNEXPECTED_MESSAGE", "The battle has not started");
    if (index !== this.turn) return this.reject(index, "NOT_YOUR_TURN", "Wait for your turn");
    if (this.pendingShot) return this.reject(index, "UNEXPECTED_MESSAGE", "Previous shot not resolved yet");
    if (!field.move(message.shipId, message.direction)) {
      return this.reject(index, "INVALID_MOVE", `Ship ${message.shipId} cannot move ${message.direction}`);
    }
    await this.passTurn();
  }

  private async passTurn(): Promise<void> {
    this.turn = other(this.turn);
    await Promise.all([
      this.send(0, { t: "turn", yourTurn: this.turn === 0 }),
      this.send(1, { t: "turn", yourTurn: this.turn === 1 }),
    ]);
  }

  private activeField(index: SeatIndex): Battlefield | null {
    return this.phase === "playing" ? this.seats[index].field : null;
  }

  private seatOf(clientId: number): SeatIndex | null {
    if (this.seats[0].player.client.id === clientId) return 0;
    if (this.seats[1].player.client.id === clientId) return 1;
    return null;
  }

  private send(index: SeatIndex, message: ProtocolMessage): Promise<void> {
    return safeSend(this.seats[index].player.client, message, this.logger);
  }

  private reject(index: SeatIndex, code: ErrorCode, msg: string): Promise<void> {
    return this.send(index, { t: "error", code, msg });
  }
}

function other(index: SeatIndex): SeatIndex {
  return index === 0 ? 1 : 0;
}
