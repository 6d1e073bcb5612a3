export type { OracleCallOptions, TextOracle } from "./types.js";
export { BedrockTextOracle, type BedrockOracleSettings } from "./bedrock.js";
export { TimeoutBoundOracle, withTimeout } from "./timeout.js";
