export * from "./identity.js";
export * from "./rule.js";
export * from "./state.js";
export * from "./verdict.js";
