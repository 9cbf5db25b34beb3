export type { ScorePacketTransport, SidebarUpdaterConfig, SidebarUpdaterProps } from "./sidebar-updater";
export { SidebarUpdater } from "./sidebar-updater";
