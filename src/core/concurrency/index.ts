// src/core/concurrency/index.ts
// Cooperative tasks, scheduler and gather

export * from "./types";
export * from "./errors";
export * from "./scheduler";
export * from "./task";
export * from "./gather";
