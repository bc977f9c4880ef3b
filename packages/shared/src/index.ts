export * from "./types.js";
export * from "./timestamp.js";
export { escapeHtml } from "./html.js";
