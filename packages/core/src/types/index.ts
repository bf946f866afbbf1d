export * from "./connections";
export * from "./ports";
