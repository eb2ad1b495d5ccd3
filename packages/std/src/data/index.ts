export * from "./cast.js";
export * from "./hasher.js";
