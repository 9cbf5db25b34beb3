export type { ScoreEntry, ScoreSource, SidebarObjective } from "./score-entry";
