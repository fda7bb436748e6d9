/**
 * Session Module
 *
 * Exports the WorldSimulation class, the owner of one simulated world.
 */

export { WorldSimulation } from "./WorldSimulation.js"
