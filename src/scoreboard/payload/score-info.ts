import type { Team } from "../team";

/**
 * Wire-level record for one sidebar row. The same record is used to add
 * (or change) a row and to remove it; removal only looks at `scoreboardId`.
 */
export interface ScoreInfo {
  scoreboardId: number;
  objectiveId: string;
  score: number;
  displayName: string;
}

/**
 * What a payload builder may read from a displayed row.
 */
export interface DisplayRow<TTeam extends Team = Team> {
  readonly id: number;
  readonly name: string;
  readonly score: number;
  readonly team: TTeam | undefined;
  /** Tie-break marker, if the row is part of a tie run */
  readonly order: string | undefined;
}

/**
 * Builds the outbound record for a row. The result is cached on the row
 * until the row changes again.
 */
export interface ScorePayloadBuilder<TTeam extends Team = Team> {
  build(row: DisplayRow<TTeam>, objectiveId: string): ScoreInfo;
}

/**
 * Default builder: `marker + prefix + name + suffix`.
 *
 * The marker goes first because the client orders rows with equal scores
 * by their rendered text.
 */
export class SidebarPayloadBuilder implements ScorePayloadBuilder {
  build(row: DisplayRow, objectiveId: string): ScoreInfo {
    let displayName = row.name;
    if (row.team) {
      displayName = row.team.prefix + displayName + row.team.suffix;
    }
    if (row.order !== undefined) {
      displayName = row.order + displayName;
    }

    return {
      scoreboardId: row.id,
      objectiveId,
      score: row.score,
      displayName,
    };
  }
}
