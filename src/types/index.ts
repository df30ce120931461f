// All public types
export * from "./endpoint";
export * from "./transport";
export * from "./failover";
export * from "./observability";
