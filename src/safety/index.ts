export { emptySafetyData, parseSafetyData } from './SafetyDataParser.js';
export type { Pictogram, SafetyData } from './SafetyDataParser.js';
