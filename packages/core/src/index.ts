export * from "./workflows/index.js";
export * from "./logging/logger.js";
export * from "./completion/textCompletion.js";
export * from "./shared/provider/openaiCompatible.js";
