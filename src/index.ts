/**
 * stratum-ui - element tree layout with fixed, content and fill sizing
 */

export const VERSION = "0.1.0";

export * from "./ui";
export * as vec2 from "./math/vec2";
export type { Vec2 } from "./math/vec2";
