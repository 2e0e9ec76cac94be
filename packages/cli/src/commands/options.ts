import type { ConnectionOptions } from "../config/schemas";
import type { LogOptions } from "../utils/logger";

export type CommonOptions = ConnectionOptions & LogOptions;
