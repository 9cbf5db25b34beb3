export type { ScoreInfo, DisplayRow, ScorePayloadBuilder } from "./score-info";
export { SidebarPayloadBuilder } from "./score-info";
export type { ScorePacket } from "./score-packet-codec";
export {
  ScorePacketAction,
  ScorePacketCodec,
  MAX_OBJECTIVE_ID_BYTES,
  MAX_DISPLAY_NAME_BYTES,
} from "./score-packet-codec";
