export * from "./utils/index.js";
export * from "./middleware/index.js";
