// Re-export all types for easy importing
export * from "./database";
export * from "./indexes";
export * from "./migrations";
export * from "./models";
