export * from "./entities/site-spec";
export * from "./entities/commit";
export * from "./entities/step-result";
export * from "./entities/run-summary";
