export { DcaBotBuilder } from "./dca-bot-builder.js";
export type { DcaBot, DcaBotComponents, ResilienceTuning } from "./dca-bot-builder.js";
