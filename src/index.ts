export * from "./logger";
export * from "./errors";
export * from "./config";
export * from "./health";
export * from "./catalog";
export * from "./envelope";
export * from "./messages";
export * from "./reassembler";
export * from "./update_interest";
export * from "./device_set";
export * from "./transport";
export * from "./in_memory_transport";
export * from "./peer_connection";
export * from "./server";
