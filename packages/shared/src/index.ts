export * from "./types/palette";
export * from "./types/config";
