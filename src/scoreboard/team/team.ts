/**
 * Team as seen by the sidebar. Only the prefix and suffix end up
 * in the rendered row.
 */
export interface Team {
  readonly name: string;
  readonly prefix: string;
  readonly suffix: string;
}

/**
 * Read access to the session's team membership.
 *
 * Members usually leave a team without the sidebar being told,
 * which is why membership is re-checked on every render.
 */
export interface TeamStore<TTeam extends Team = Team> {
  /** Whether the team is about to be removed from the scoreboard */
  isFlaggedForRemoval(team: TTeam): boolean;

  /** Whether `name` is still a member of the team */
  teamContains(team: TTeam, name: string): boolean;

  /** Team `name` belongs to, if any */
  teamFor(name: string): TTeam | undefined;
}
