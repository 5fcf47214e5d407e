// Orchestrator exports for uipom
export { defaultEngines } from './engines.js';
export { runSmoke, type SmokeOptions } from './runManager.js';
export { writeReport, renderJUnit, type ReportPaths } from './reportWriter.js';
export { runCli, type CliIO } from './program.js';
