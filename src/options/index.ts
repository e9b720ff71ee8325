/**
 * Option exports
 */

export { bare, valued } from "./base";
export * from "./catalogue";
