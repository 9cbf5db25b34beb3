export type { Team, TeamStore } from "./team";
