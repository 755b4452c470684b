/* ------------------------------------------------- */
/* File: src/engine/ship.ts                          */
/* ------------------------------------------------- */
import { Direction, Orientation, Position, ShipPlacement, ShipType } from "./types.js";
import { inBounds, translate } from "./movement.js";

export const DEFAULT_FIELD_LENGTH = 10;

export const HULL_LENGTH: Record<ShipType, number> = {
  Battleship: 5,
  Cruiser: 4,
  Destroyer: 3,
  Submarine: 2,
};

/**
 * Navire rectangulaire. Les cases occupées dépendent de l'origine, de
 * l'orientation et de la coque ; les dégâts sont stockés par segment et
 * suivent le navire quand il bouge.
 */
export class Ship {
  readonly xLength: number;
  readonly yLength: number;
  private origin: Position;
  private readonly damage: boolean[];

  constructor(
    readonly id: number,
    readonly type: ShipType,
    x: number,
    y: number,
    readonly orientation: Orientation,
    readonly fieldLength: number = DEFAULT_FIELD_LENGTH,
  ) {
    const hull = HULL_LENGTH[type];
    this.xLength = orientation === "horizontal" ? hull : 1;
    this.yLength = orientation === "horizontal" ? 1 : hull;
    this.origin = { x, y };
    this.damage = new Array<boolean>(hull).fill(false);
  }

  get position(): Position {
    return { ...this.origin };
  }

  get hits(): number {
    return this.damage.filter(Boolean).length;
  }

  get isSunk(): boolean {
    return this.damage.every(Boolean);
  }

  occupiedCells(from: Position = this.origin): Position[] {
    const cells: Position[] = [];
    for (let dy = 0; dy < this.yLength; dy++) {
      for (let dx = 0; dx < this.xLength; dx++) {
        cells.push({ x: from.x + dx, y: from.y + dy });
      }
    }
    return cells;
  }

  occupies(x: number, y: number): boolean {
    return this.segmentAt(x, y) !== -1;
  }

  isWithinBounds(): boolean {
    return this.occupiedCells().every(c => inBounds(c, this.fieldLength));
  }

  /** cases après déplacement, ou null si hors grille */
  cellsAfterMove(direction: Direction): Position[] | null {
    const cells = this.occupiedCells(translate(this.origin, direction));
    return cells.every(c => inBounds(c, this.fieldLength)) ? cells : null;
  }

  move(direction: Direction): boolean {
    if (!this.cellsAfterMove(direction)) return false;
    this.origin = translate(this.origin, direction);
    return true;
  }

  // segment déjà touché : true, sans double comptage
  strikeAtPosition(x: number, y: number): boolean {
    const segment = this.segmentAt(x, y);
    if (segment === -1) return false;
    this.damage[segment] = true;
    return true;
  }

  getShipType(): ShipType {
    return this.type;
  }

  toPlacement(): ShipPlacement {
    return {
      id: this.id,
      type: this.type,
      x: this.origin.x,
      y: this.origin.y,
      orientation: this.orientation,
    };
  }

  private segmentAt(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return -1;
    const dx = x - this.origin.x;
    const dy = y - this.origin.y;
    if (dx < 0 || dy < 0 || dx >= this.xLength || dy >= this.yLength) return -1;
    return dx + dy;
  }
}

export class Battleship extends Ship {
  constructor(id: number, x: number, y: number, orientation: Orientation = "horizontal", fieldLength?: number) {
    super(id, "Battleship", x, y, orientation, fieldLength);
  }
}

export class Cruiser extends Ship {
  constructor(id: number, x: number, y: number, orientation: Orientation = "horizontal", fieldLength?: number) {
    super(id, "Cruiser", x, y, orientation, fieldLength);
  }
}

export class Destroyer extends Ship {
  constructor(id: number, x: number, y: number, orientation: Orientation = "horizontal", fieldLength?: number) {
    super(id, "Destroyer", x, y, orientation, fieldLength);
  }
}

export class Submarine extends Ship {
  constructor(id: number, x: number, y: number, orientation: Orientation = "horizontal", fieldLength?: number) {
    super(id, "Submarine", x, y, orientation, fieldLength);
  }
}

type ShipVariant = new (
  id: number,
  x: number,
  y: number,
  orientation?: Orientation,
  fieldLength?: number,
) => Ship;

const VARIANTS: Record<ShipType, ShipVariant> = {
  Battleship,
  Cruiser,
  Destroyer,
  Submarine,
};

export function createShip(placement: ShipPlacement, fieldLength: number = DEFAULT_FIELD_LENGTH): Ship {
  const Variant = VARIANTS[placement.type];
  return new Variant(placement.id, placement.x, placement.y, placement.orientation, fieldLength);
}
