export * from "./constants";
export * from "./schemas/jobs";
export * from "./schemas/nodes";
