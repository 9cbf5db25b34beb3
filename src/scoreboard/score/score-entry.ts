/**
 * A single score as held by the objective that owns it.
 * The reconciler only ever reads these.
 */
export interface ScoreEntry {
  /** Unique key within the objective */
  readonly name: string;
  /** Signed score value, a safe integer */
  readonly score: number;
  /** Hidden scores are never shown on the sidebar */
  readonly hidden: boolean;
}

/**
 * Anything that can list the current scores of an objective.
 * Called once per render, and the result is treated as a consistent read.
 */
export interface ScoreSource {
  listScores(): Iterable<ScoreEntry>;
}

/**
 * The objective shown on a sidebar: its scores plus what the
 * show-sidebar directive needs.
 */
export interface SidebarObjective extends ScoreSource {
  /** Objective id used on the wire */
  readonly id: string;
  /** Title shown above the sidebar */
  readonly displayName: string;
}
