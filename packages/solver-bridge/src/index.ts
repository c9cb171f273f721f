export * from "./canonical";
export * from "./command";
export * from "./runner";
export * from "./parser";
export * from "./cache";
export * from "./bridge";
