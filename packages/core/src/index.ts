export * from "./config";
export * from "./DynamoDBTokenStore";
export * from "./errors";
export * from "./MemoryTokenStore";
export * from "./schema";
export * from "./TokenManager";
export type * from "./TokenStore";
export * from "./TokenSweeper";
export { getDefaultLogger, tokenPrefix } from "./logger";
