/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export { createCronRoutes } from "./cron";
export type { TickDepsFactory } from "./cron";
