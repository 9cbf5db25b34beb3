import type { ScoreEntry } from "../score";
import type { Team } from "../team";
import type { DisplayRow, ScoreInfo, ScorePayloadBuilder } from "../payload";

/**
 * One row of a sidebar as it is (or is about to be) shown on the client.
 *
 * The row keeps its id for as long as its name stays on the sidebar. The
 * backing {@link ScoreEntry} is swapped for a fresh one on every render.
 *
 * Changes are tracked in two buckets: the score value itself, and anything
 * that alters the rendered text (team, tie marker). Only the latter forces
 * the client to drop and re-add the row.
 */
export class DisplayEntry<TTeam extends Team = Team> implements DisplayRow<TTeam> {
  readonly id: number;
  private reference: ScoreEntry;
  private _team: TTeam | undefined;
  private _order: string | undefined;
  private info: ScoreInfo | undefined;

  private scoreChanged = false;
  private layoutChanged = false;
  private lastChangeWasScoreOnly = false;

  constructor(id: number, reference: ScoreEntry, team: TTeam | undefined) {
    this.id = id;
    this.reference = reference;
    this._team = team;
  }

  get name(): string {
    return this.reference.name;
  }

  get score(): number {
    return this.reference.score;
  }

  get team(): TTeam | undefined {
    return this._team;
  }

  /** Changing the team marks the row for a full resend */
  set team(team: TTeam | undefined) {
    if (this._team === team) return;
    this._team = team;
    this.layoutChanged = true;
  }

  get order(): string | undefined {
    return this._order;
  }

  /** Changing the marker marks the row for a full resend */
  set order(order: string | undefined) {
    if (this._order === order) return;
    this._order = order;
    this.layoutChanged = true;
  }

  /**
   * Whether the client has been sent this row before.
   */
  get exists(): boolean {
    return this.info !== undefined;
  }

  /**
   * Whether the cached payload is out of date.
   */
  get shouldUpdate(): boolean {
    return !this.exists || this.scoreChanged || this.layoutChanged;
  }

  /**
   * Whether the last {@link update} was caused by the score value alone.
   */
  get onlyScoreValueChanged(): boolean {
    return this.lastChangeWasScoreOnly;
  }

  /**
   * Last payload built for this row.
   * @throws Error if the row was never updated
   */
  get cachedInfo(): ScoreInfo {
    if (!this.info) {
      throw new Error(`Score "${this.name}" (#${this.id}) has no payload yet`);
    }
    return this.info;
  }

  /**
   * Points the row at this render's score.
   */
  refresh(reference: ScoreEntry): void {
    if (reference.score !== this.reference.score) {
      this.scoreChanged = true;
    }
    this.reference = reference;
  }

  /**
   * Rebuilds the cached payload and clears pending changes.
   */
  update(objectiveId: string, payloads: ScorePayloadBuilder<TTeam>): void {
    this.lastChangeWasScoreOnly = this.exists && this.scoreChanged && !this.layoutChanged;
    this.info = payloads.build(this, objectiveId);
    this.scoreChanged = false;
    this.layoutChanged = false;
  }
}
