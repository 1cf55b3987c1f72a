/**
 * climate-ops 公共入口
 */

export * from './common/config/config-manager';
export { EnvLoader, env } from './common/config/env';
export * from './common/utils/logger';
export * from './common/utils/error-handler';
export * from './launcher/port-inspector';
export * from './launcher/process-terminator';
export * from './launcher/server-launcher';
export { createLaunchProgram, applyLaunchFlags } from './launcher/cli';
export * from './download/date-range';
export * from './download/bulk-client';
export * from './download/csv-cleaner';
export * from './download/directory-lock';
export * from './download/bulk-download-driver';
export * from './download/hourly-daemon';
export { createDownloadProgram, applyDownloadFlags, renderPlan } from './download/cli';
