export { GateReason, evaluateEntryGate } from "./entry-gate.js";
export type { EntryGateInput, EntryVerdict } from "./entry-gate.js";
export { LEVEL_STEP, entryMultiplier, sizeEntry } from "./entry-sizer.js";
export type { EntrySize, EntrySizingInput } from "./entry-sizer.js";
export {
	DEFAULT_FIXED_PROGRESSIVE,
	FixedProgressiveSpacing,
	createSpacingStrategy,
} from "./spacing.js";
export type { FixedProgressiveParams, SpacingContext, SpacingSettings, SpacingStrategy } from "./spacing.js";
