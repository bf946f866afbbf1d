export * from "./collectors";
export * from "./actions";
export * from "./errors";
export * from "./exec";
export * from "./port-scanner";
export * from "./probe";
