/**
 * Pipeline modules export
 */

export { prepare } from "./prepare";
export { dependencies } from "./dependencies";
export { html } from "./html";
export { cleanIntermediate, cleanHtml } from "./cleanup";
export { ebook } from "./ebook";
export { stats } from "./stats";
