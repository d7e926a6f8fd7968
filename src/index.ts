export { createProgram, runInstall, runStatus, runUninstall } from './cli';
export { resolveLayout, DEPENDENCY_SETS, PRODUCT, SERVICE } from './config';
export * from './installers';
