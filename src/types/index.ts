export * from "./ast";
export * from "./token";
