import { describe, expect, it } from "vitest";

import { DIRECTIONS } from "../src/engine/types.js";
import { Battleship, Cruiser, Destroyer, HULL_LENGTH, Ship, Submarine, createShip } from "../src/engine/ship.js";

describe("Ship", () => {
  it("derives its footprint from type and orientation", () => {
    expect(new Battleship(1, 0, 0).occupiedCells()).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 3, y: 0 },
      { x: 4, y: 0 },
    ]);
    expect(new Destroyer(2, 7, 4, "vertical").occupiedCells()).toEqual([
      { x: 7, y: 4 },
      { x: 7, y: 5 },
      { x: 7, y: 6 },
    ]);
  });

  it("gives each variant its hull length", () => {
    const variants: Ship[] = [new Battleship(1, 0, 0), new Cruiser(2, 0, 1), new Destroyer(3, 0, 2), new Submarine(4, 0, 3)];
    expect(variants.map(s => [s.type, s.xLength, s.yLength])).toEqual([
      ["Battleship", 5, 1],
      ["Cruiser", 4, 1],
      ["Destroyer", 3, 1],
      ["Submarine", 2, 1],
    ]);
    expect(HULL_LENGTH.Cruiser).toBe(4);
  });

  it("builds the right variant from a placement", () => {
    const ship = createShip({ id: 9, type: "Cruiser", x: 2, y: 3, orientation: "vertical" }, 12);

    expect(ship).toBeInstanceOf(Cruiser);
    expect(ship.fieldLength).toBe(12);
    expect(ship.toPlacement()).toEqual({ id: 9, type: "Cruiser", x: 2, y: 3, orientation: "vertical" });
  });

  describe("move", () => {
    it("moves only when the whole hull stays on the grid", () => {
      for (const direction of DIRECTIONS) {
        const ship = new Battleship(1, 0, 0);
        const expected = ship.cellsAfterMove(direction) !== null;

        expect(ship.move(direction)).toBe(expected);
        expect(ship.position).toEqual(
          expected ? { x: direction === "right" ? 1 : 0, y: direction === "down" ? 1 : 0 } : { x: 0, y: 0 },
        );
      }
    });

    it("refuses to push the bow past the far edge", () => {
      const ship = new Battleship(1, 5, 9);

      expect(ship.move("right")).toBe(false);
      expect(ship.move("down")).toBe(false);
      expect(ship.position).toEqual({ x: 5, y: 9 });
      expect(ship.move("left")).toBe(true);
      expect(ship.position).toEqual({ x: 4, y: 9 });
    });
  });

  describe("strikeAtPosition", () => {
    it("hits occupied cells only", () => {
      const ship = new Submarine(1, 3, 3, "vertical");

      expect(ship.strikeAtPosition(3, 2)).toBe(false);
      expect(ship.strikeAtPosition(4, 3)).toBe(false);
      expect(ship.strikeAtPosition(3, 4)).toBe(true);
      expect(ship.hits).toBe(1);
    });

    it("misses fractional coordinates inside the hull", () => {
      const ship = new Submarine(1, 0, 0);

      expect(ship.strikeAtPosition(0.5, 0)).toBe(false);
      expect(ship.occupies(0.5, 0)).toBe(false);
      expect(ship.occupies(0, 0.5)).toBe(false);
      expect(ship.hits).toBe(0);
    });

    it("reports repeated strikes as hits without counting them twice", () => {
      const ship = new Submarine(1, 0, 0);

      expect(ship.strikeAtPosition(1, 0)).toBe(true);
      expect(ship.strikeAtPosition(1, 0)).toBe(true);
      expect(ship.hits).toBe(1);
      expect(ship.isSunk).toBe(false);
    });

    it("keeps damage on the hull when the ship moves", () => {
      const ship = new Submarine(1, 0, 0);
      ship.strikeAtPosition(0, 0);
      ship.move("down");

      expect(ship.strikeAtPosition(0, 0)).toBe(false);
      expect(ship.strikeAtPosition(1, 1)).toBe(true);
      expect(ship.isSunk).toBe(true);
    });
  });
});
