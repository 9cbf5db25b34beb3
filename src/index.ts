/**
 * sidebar-sync
 *
 * Keeps a client's scoreboard sidebar in sync with the server's scores:
 * - Render pass that diffs the top scores against what the client was sent
 * - Stable row identities across renders
 * - Invisible markers to order rows with equal scores
 * - Binary codec for score packets
 * - Per-session updater that renders on a fixed tick
 */

// Core utilities
export * from "./core/binary-codec";

// Sidebar reconciliation
export * from "./scoreboard";
