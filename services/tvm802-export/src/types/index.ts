/**
 * TVM802 Export - Core Type Definitions
 */

// ============================================================================
// Placement Types
// ============================================================================

/** Header layouts a placement CSV can arrive in */
export type PositionSchema = 'kicad_pos' | 'positions' | 'unknown';

/**
 * How much of a placement row must be present.
 *
 * `placement` needs coordinates; `keys` only needs what forms a component key.
 */
export type PlacementReadMode = 'placement' | 'keys';

export type CsvRow = string[];

export interface PlacementRecord {
  readonly ref: string;
  readonly value: string;
  readonly package: string;
  /** Numeric text kept exactly as exported */
  readonly x: string;
  readonly y: string;
  readonly rotation: string;
  readonly schema: PositionSchema;
}

export interface PlacementTable {
  schema: PositionSchema;
  header: CsvRow | null;
  rows: CsvRow[];
}

// ============================================================================
// BOM & Feeder Types
// ============================================================================

/** Reference designator -> component key */
export type BomIndex = ReadonlyMap<string, string>;

export interface FeederAssignment {
  feeder: string;
  nozzle: string;
  speed: string;
  height: string;
}

/** Component key -> feeder assignment */
export type FeederCatalog = ReadonlyMap<string, FeederAssignment>;

/** What happens when a key shows up twice in a BOM or feeders file */
export type DuplicatePolicy = 'overwrite' | 'error';

export interface ReaderOptions {
  duplicates?: DuplicatePolicy;
  /** Named in parse errors, usually the file path */
  source?: string;
}

// ============================================================================
// Output Types
// ============================================================================

export interface MarkCoordinate {
  /** Reference the coordinate was taken from, when one was found */
  ref: string | null;
  x: string;
  y: string;
}

export interface MachineDataResult {
  rowsTotal: number;
  rowsWithFeeder: number;
  mark1: MarkCoordinate;
  mark2: MarkCoordinate;
}

export interface MachineRowDefaults {
  nozzle: string;
  speed: string;
  height: string;
}

export interface TemplateRowDefaults {
  nozzle: string;
  speed: string;
  height: string;
}
