/* ------------------------------------------------- */
/* File: src/lobby/lobby.ts                          */
/* ------------------------------------------------- */
import type { Logger } from "../engine/types.js";
import type { ErrorCode } from "../errors.js";
import type { ProtocolMessage } from "../net/protocol.js";
import type { ClientHandlers, ServerClient } from "../net/server.js";
import { Match, safeSend } from "./match.js";

interface LobbyPlayer {
  client: ServerClient;
  username: string | null;
  match: Match | null;
}

export interface LobbyOptions {
  length: number;
  logger?: Logger;
}

/**
 * Salle d'attente : pseudos uniques, appariement des deux premiers joueurs,
 * puis tout passe par le Match.
 */
export class Lobby {
  private readonly players = new Map<number, LobbyPlayer>();
  private readonly usernames = new Set<string>();
  private waiting: LobbyPlayer | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: LobbyOptions) {
    this.logger = options.logger ?? console;
  }

  get onlineCount(): number {
    return this.players.size;
  }

  /** à passer à `SessionServer` comme `onClientConnected` */
  handleConnect = (client: ServerClient): ClientHandlers => {
    const player: LobbyPlayer = { client, username: null, match: null };
    this.players.set(client.id, player);

    return {
      onMessage: message => this.handleMessage(player, message),
      onDisconnect: () => {
        this.handleDisconnect(player).catch(err =>
          this.logger.error(`[LOBBY] Cleanup for client #${client.id} failed:`, err),
        );
      },
    };
  };

  private async handleMessage(player: LobbyPlayer, message: ProtocolMessage): Promise<void> {
    switch (message.t) {
      case "login":
        return this.login(player, message.username);
      case "place_ships":
      case "shoot":
      case "shot_result":
      case "move_ship":
        if (!player.username) return this.reject(player, "NOT_LOGGED_IN", "Log in first");
        if (!player.match) return this.reject(player, "NO_MATCH", "Waiting for an opponent");
        return player.match.handle(player.client.id, message);
      default:
        return this.reject(player, "UNEXPECTED_MESSAGE", `Clients cannot send ${message.t}`);
    }
  }

  private async login(player: LobbyPlayer, raw: string): Promise<void> {
    const username = raw.trim();
    if (player.username) {
      return this.reject(player, "UNEXPECTED_MESSAGE", `Already logged in as ${player.username}`);
    }
    if (username.length === 0) {
      return this.reject(player, "INVALID_USERNAME", "Empty usernames are not allowed");
    }
    if (this.usernames.has(username)) {
      return this.reject(player, "USERNAME_ALREADY_EXISTS", `Username ${username} is taken`);
    }

    player.username = username;
    this.usernames.add(username);
    this.logger.log(`[LOBBY] Client #${player.client.id} logged in as ${username}`);
    await safeSend(player.client, { t: "login_ok", clientId: player.client.id }, this.logger);

    const opponent = this.waiting;
    if (!opponent?.username) {
      this.waiting = player;
      return;
    }

    this.waiting = null;
    const match = new Match(
      { client: opponent.client, username: opponent.username },
      { client: player.client, username },
      this.options.length,
      this.logger,
    );
    opponent.match = match;
    player.match = match;
    await match.announce();
  }

  private async handleDisconnect(player: LobbyPlayer): Promise<void> {
    this.players.delete(player.client.id);
    if (player.username) this.usernames.delete(player.username);
    if (this.waiting === player) this.waiting = null;

    const match = player.match;
    player.match = null;
    if (match) await match.leave(player.client.id);
  }

  private reject(player: LobbyPlayer, code: ErrorCode, msg: string): Promise<void> {
    return safeSend(player.client, { t: "error", code, msg }, this.logger);
  }
}
