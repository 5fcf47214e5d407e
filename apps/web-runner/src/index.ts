/**
 * Web Runner
 * Playwright-backed web sessions and the web page-object base
 */

export {
  DEFAULT_HOLD_MS,
  PlaywrightDriverHandle,
  createWebDriver,
  launchPlan,
  toPlaywrightSelector,
} from './webDriver.js';
export type { LaunchPlan, PlaywrightLocator, PlaywrightPage, PlaywrightScope } from './webDriver.js';
export { BaseWebPage } from './baseWebPage.js';
