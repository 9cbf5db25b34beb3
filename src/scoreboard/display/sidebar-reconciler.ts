import type { ScoreEntry, SidebarObjective } from "../score";
import type { Team, TeamStore } from "../team";
import { COLOR_CODE_MARKERS, type MarkerPalette } from "../marker";
import { SidebarPayloadBuilder, type DisplayRow, type ScoreInfo, type ScorePayloadBuilder } from "../payload";
import { DisplayEntry } from "./display-entry";
import { SequentialIdAllocator, type IdAllocator } from "./id-allocator";
import { ObjectiveUpdateType, type SidebarDirectives } from "./objective-update";

/**
 * Configuration for sidebar rendering
 */
export interface SidebarConfig {
  /**
   * Maximum number of rows shown (default: 15)
   * Must not exceed the marker palette size
   */
  displayLimit?: number;

  /**
   * Display slot passed to the show-sidebar directive (default: "sidebar")
   */
  position?: string;

  /**
   * Enable debug logging
   */
  debug?: boolean;
}

/**
 * Dependencies of a SidebarReconciler
 */
export interface SidebarReconcilerConfig<TTeam extends Team = Team> {
  /** Team membership of the client's session */
  teams: TeamStore<TTeam>;

  /** Receives whole-sidebar create/destroy directives */
  directives: SidebarDirectives;

  /** Tie-break markers (default: COLOR_CODE_MARKERS) */
  palette?: MarkerPalette;

  /** Builds the outbound record per row (default: SidebarPayloadBuilder) */
  payloads?: ScorePayloadBuilder<TTeam>;

  /** Row identities, share one per session (default: a fresh SequentialIdAllocator) */
  ids?: IdAllocator;

  config?: SidebarConfig;
}

/**
 * Outcome of one render, in the order the client has to apply it:
 * first `remove`, then `add`.
 */
export interface SidebarRenderResult {
  add: ScoreInfo[];
  remove: ScoreInfo[];
}

/** Rows the client will show at most */
export const SIDEBAR_DISPLAY_LIMIT = 15;

/**
 * Score descending, then name ascending ignoring case.
 */
export function compareForDisplay(a: ScoreEntry, b: ScoreEntry): number {
  if (a.score !== b.score) return b.score - a.score;

  const an = a.name.toLowerCase();
  const bn = b.name.toLowerCase();
  return an < bn ? -1 : an > bn ? 1 : 0;
}

/**
 * Keeps one client's sidebar in sync with an objective.
 *
 * Each {@link render} compares the objective's current top scores with
 * what was sent last time and returns the rows to add and remove.
 *
 * Two lists are kept:
 * - `entries`, the published rows. Replaced as a whole on every render and
 *   never emptied in place, so {@link setTeamFor} always sees a full list.
 * - `snapshot`, a private copy the render pass takes apart while matching.
 *
 * The client cannot sort rows with equal scores, so tied rows get an
 * invisible marker from the palette that makes their text sort correctly.
 *
 * @example
 * ```ts
 * const reconciler = new SidebarReconciler({ teams, directives });
 *
 * const { add, remove } = reconciler.render(objective, ObjectiveUpdateType.ADD);
 * session.sendScores(ScorePacketAction.REMOVE, remove);
 * session.sendScores(ScorePacketAction.CHANGE, add);
 * ```
 */
export class SidebarReconciler<TTeam extends Team = Team> {
  private teams: TeamStore<TTeam>;
  private directives: SidebarDirectives;
  private palette: MarkerPalette;
  private payloads: ScorePayloadBuilder<TTeam>;
  private ids: IdAllocator;
  private config: Required<SidebarConfig>;

  private entries: readonly DisplayEntry<TTeam>[] = [];
  private readonly snapshot: DisplayEntry<TTeam>[] = [];

  constructor(config: SidebarReconcilerConfig<TTeam>) {
    this.teams = config.teams;
    this.directives = config.directives;
    this.palette = config.palette ?? COLOR_CODE_MARKERS;
    this.payloads = config.payloads ?? new SidebarPayloadBuilder();
    this.ids = config.ids ?? new SequentialIdAllocator();
    this.config = {
      displayLimit: config.config?.displayLimit ?? SIDEBAR_DISPLAY_LIMIT,
      position: config.config?.position ?? "sidebar",
      debug: config.config?.debug ?? false,
    };

    const { displayLimit } = this.config;
    if (!Number.isInteger(displayLimit) || displayLimit < 1) {
      throw new RangeError(`displayLimit must be a positive integer, got ${displayLimit}`);
    }
    if (displayLimit > this.palette.size) {
      throw new RangeError(
        `displayLimit ${displayLimit} exceeds the ${this.palette.size} available tie markers`
      );
    }
  }

  /**
   * Rows currently shown, top to bottom. The returned array is never
   * modified afterwards.
   */
  get displayEntries(): readonly DisplayRow<TTeam>[] {
    return this.entries;
  }

  /**
   * Brings the sidebar in line with `objective`.
   *
   * @param updateType What happened to the objective since the last render
   */
  render(objective: SidebarObjective, updateType: ObjectiveUpdateType): SidebarRenderResult {
    const objectiveAdd = updateType === ObjectiveUpdateType.ADD;
    const objectiveUpdate = updateType === ObjectiveUpdateType.UPDATE;
    const transitioning = objectiveAdd || objectiveUpdate;
    const result: SidebarRenderResult = { add: [], remove: [] };

    if (objectiveUpdate) {
      this.directives.destroySidebar(objective.id);
    }

    const entries = this.matchCandidates(this.selectCandidates(objective));

    // Published before anything else so team updates see the new order.
    this.entries = entries;

    // Whatever was not matched is no longer displayed.
    const kept = new Set(entries);
    for (const entry of this.snapshot) {
      if (!kept.has(entry)) {
        result.remove.push(entry.cachedInfo);
      }
    }

    this.snapshot.length = 0;
    this.snapshot.push(...entries);

    this.assignTieMarkers(entries);

    for (const entry of entries) {
      let add = transitioning;
      const exists = entry.exists;

      const team = entry.team;
      if (team && (this.teams.isFlaggedForRemoval(team) || !this.teams.teamContains(team, entry.name))) {
        entry.team = undefined;
        add = true;
      }

      if (entry.shouldUpdate) {
        entry.update(objective.id, this.payloads);
        add = true;
      }

      if (add) {
        result.add.push(entry.cachedInfo);
      }

      // The client does not reorder a row that is refreshed in place unless
      // only its score changed, so anything else is removed and re-added.
      if (add && exists && !transitioning && !entry.onlyScoreValueChanged) {
        result.remove.push(entry.cachedInfo);
      }
    }

    if (transitioning) {
      this.directives.showSidebar(objective.id, objective.displayName, this.config.position);
    }

    this.log(
      `Rendered "${objective.id}": ${entries.length} rows, +${result.add.length} -${result.remove.length}`
    );

    return result;
  }

  /**
   * Assigns `team` to every displayed row whose name is in `names`.
   *
   * Rows not on the sidebar are left alone; they look up their team
   * themselves when they get displayed.
   */
  setTeamFor(team: TTeam, names: ReadonlySet<string>): void {
    for (const entry of this.entries) {
      if (names.has(entry.name)) {
        entry.team = team;
      }
    }
  }

  /**
   * Forgets every row and tears the sidebar down on the client.
   * The next render starts from scratch and should be an ADD.
   */
  remove(objectiveId: string): void {
    this.entries = [];
    this.snapshot.length = 0;
    this.directives.destroySidebar(objectiveId);
    this.log(`Removed "${objectiveId}"`);
  }

  /**
   * Visible scores, best first, capped at the display limit.
   */
  private selectCandidates(objective: SidebarObjective): ScoreEntry[] {
    const candidates: ScoreEntry[] = [];
    for (const score of objective.listScores()) {
      if (!score.hidden) {
        candidates.push(score);
      }
    }

    return candidates.sort(compareForDisplay).slice(0, this.config.displayLimit);
  }

  /**
   * Reuses the row of every candidate already on the sidebar, by name, and
   * creates rows for the rest. With duplicate names the first unmatched row wins.
   */
  private matchCandidates(candidates: ScoreEntry[]): DisplayEntry<TTeam>[] {
    const previous = new Map<string, DisplayEntry<TTeam>[]>();
    for (const entry of this.snapshot) {
      const sameName = previous.get(entry.name);
      if (sameName) {
        sameName.push(entry);
      } else {
        previous.set(entry.name, [entry]);
      }
    }

    return candidates.map((reference) => {
      const existing = previous.get(reference.name)?.shift();
      if (existing) {
        existing.refresh(reference);
        return existing;
      }

      return new DisplayEntry<TTeam>(this.ids.next(), reference, this.teams.teamFor(reference.name));
    });
  }

  /**
   * Gives every run of equal scores markers 0, 1, 2, ... and clears the
   * marker of every row outside a run.
   */
  private assignTieMarkers(entries: readonly DisplayEntry<TTeam>[]): void {
    let runStart = 0;
    for (let i = 1; i <= entries.length; i++) {
      if (i < entries.length && entries[i].score === entries[runStart].score) continue;

      const tied = i - runStart > 1;
      for (let j = runStart; j < i; j++) {
        entries[j].order = tied ? this.palette.markerForIndex(j - runStart) : undefined;
      }
      runStart = i;
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[SidebarReconciler] ${message}`);
    }
  }
}
