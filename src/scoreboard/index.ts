/**
 * @module scoreboard
 *
 * Sidebar reconciliation for clients that cap the sidebar at 15 rows, cannot
 * sort rows with equal scores and do not reorder rows refreshed in place.
 *
 * @example
 * ```typescript
 * import { SidebarReconciler, ObjectiveUpdateType } from './scoreboard';
 *
 * const reconciler = new SidebarReconciler({ teams, directives });
 *
 * // Once per tick
 * const { add, remove } = reconciler.render(objective, ObjectiveUpdateType.NOTHING);
 *
 * // From anywhere, whenever team membership changes
 * reconciler.setTeamFor(redTeam, new Set(['Alice', 'Bob']));
 * ```
 */

export * from "./score";
export * from "./team";
export * from "./marker";
export * from "./payload";
export * from "./display";
export * from "./updater";
