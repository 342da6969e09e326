export * from "./amounts.js";
export * from "./errors.js";
export * from "./ids.js";
export * from "./json.js";
export * from "./payloads.js";
export * from "./quote.js";
export * from "./round.js";
export * from "./tx.js";
