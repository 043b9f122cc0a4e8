/**
 * Route handlers
 */

export { healthRoute } from './health.route';
export { klineRoute } from './kline.route';
export { updateRoute } from './update.route';
export { networkRoute } from './network.route';
export { schedulerRoute } from './scheduler.route';
