/**
 * What happened to the whole objective since the last render.
 * Consumed by exactly one render, after which it is back to NOTHING.
 */
export enum ObjectiveUpdateType {
  NOTHING = 0,
  /** The sidebar has to be created and every row sent */
  ADD = 1,
  /** The sidebar has to be torn down and rebuilt, e.g. after a title change */
  UPDATE = 2,
}

/**
 * Side effects for the sidebar as a whole. Fire and forget.
 */
export interface SidebarDirectives {
  destroySidebar(objectiveId: string): void;
  showSidebar(objectiveId: string, title: string, position: string): void;
}
