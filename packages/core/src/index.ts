export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./constants";

export const PORT_PROVIDER_VERSION = "0.1.0";
