/**
 * @parley/strings
 *
 * Lexical string matching used to score user input against dialogue
 * keywords.
 */

export { editDistance, closestMatch } from "./edit-distance.js";
export type { ClosestMatch } from "./edit-distance.js";
