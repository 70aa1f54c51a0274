/**
 * infiniview/refresh - Pull-to-Refresh Feature
 *
 * Entry point for the pull-to-refresh feature.
 */

export { withPullToRefresh } from "./plugin";
export type { PullToRefreshConfig } from "./plugin";
export { createRefreshController } from "../../core/refresh";
export type { RefreshController, RefreshControllerConfig } from "../../core/refresh";
