export * from "./grid";
export * from "./neighborhood";
export * from "./pattern";
