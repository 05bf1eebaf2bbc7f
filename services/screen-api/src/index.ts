export type { AppOptions } from "./app.js";
export { buildApp } from "./app.js";
