export * from "./environment";
export * from "./logs";
