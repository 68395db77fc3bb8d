export {
  assembleAnalysis,
  assembleNoData,
  assembleUnintelligible,
  availableDataSnapshot,
  capWarnings,
  summarizeIntent,
  EXAMPLE_QUERIES,
  NO_DATA_SUMMARY,
} from './assembler';
export type { AssembleBase } from './assembler';
export { toWireResponse } from './wire';
export type { WireResponse } from './wire';
