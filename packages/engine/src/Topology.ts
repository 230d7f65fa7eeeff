import {
  CellId,
  CELLS,
  COLS,
  ROWS,
  Unit,
  Variant,
  cross,
} from "@sudoprop/core";

const BOX_ROWS = [ROWS.slice(0, 3), ROWS.slice(3, 6), ROWS.slice(6, 9)];
const BOX_COLS = [COLS.slice(0, 3), COLS.slice(3, 6), COLS.slice(6, 9)];

/**
 * Static unit and peer indices for one board variant.
 * Built once per variant and never mutated; safe to share between solves.
 */
export class Topology {
  readonly variant: Variant;
  readonly cells: readonly CellId[] = CELLS;
  readonly units: readonly Unit[];
  private readonly unitIndex: ReadonlyMap<CellId, readonly Unit[]>;
  private readonly peerIndex: ReadonlyMap<CellId, ReadonlySet<CellId>>;

  constructor(variant: Variant) {
    this.variant = variant;
    this.units = buildUnitList(variant);

    const unitsOf = new Map<CellId, Unit[]>();
    const peersOf = new Map<CellId, Set<CellId>>();
    for (const cell of CELLS) {
      const containing = this.units.filter((unit) => unit.includes(cell));
      unitsOf.set(cell, containing);

      const peers = new Set<CellId>();
      for (const unit of containing) {
        for (const other of unit) {
          if (other !== cell) peers.add(other);
        }
      }
      peersOf.set(cell, peers);
    }
    this.unitIndex = unitsOf;
    this.peerIndex = peersOf;
  }

  /** Units containing `cell` */
  unitsOf(cell: CellId): readonly Unit[] {
    return this.unitIndex.get(cell) ?? [];
  }

  /** Cells sharing at least one unit with `cell`, excluding `cell` itself */
  peersOf(cell: CellId): ReadonlySet<CellId> {
    return this.peerIndex.get(cell) ?? new Set();
  }
}

function buildUnitList(variant: Variant): Unit[] {
  const rowUnits = ROWS.map((r) => cross([r], COLS));
  const columnUnits = COLS.map((c) => cross(ROWS, [c]));
  const boxUnits: Unit[] = [];
  for (const rs of BOX_ROWS) {
    for (const cs of BOX_COLS) {
      boxUnits.push(cross(rs, cs));
    }
  }

  const units: Unit[] = [...rowUnits, ...columnUnits, ...boxUnits];
  if (variant === "diagonal") {
    // Main diagonal A1..I9, anti-diagonal A9..I1
    units.push(ROWS.map((r, i) => `${r}${COLS[i]}` as const));
    units.push(ROWS.map((r, i) => `${r}${COLS[8 - i]}` as const));
  }
  return units;
}

const cache = new Map<Variant, Topology>();

/** Memoized topology for a variant */
export function getTopology(variant: Variant = "standard"): Topology {
  let topology = cache.get(variant);
  if (!topology) {
    topology = new Topology(variant);
    cache.set(variant, topology);
  }
  return topology;
}
