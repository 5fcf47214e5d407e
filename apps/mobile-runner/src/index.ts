/**
 * Mobile Runner
 * Appium sessions through WebdriverIO and the mobile page-object base
 */

export {
  AppiumDriverHandle,
  DEFAULT_HOLD_MS,
  buildCapabilities,
  createMobileDriver,
  looksLikeAppPath,
  parseServerUrl,
  toAppiumSelector,
  wdioClient,
} from './mobileDriver.js';
export type {
  AppiumClient,
  AppiumSelector,
  ElementRect,
  PointerAction,
  PointerSequence,
  ServerAddress,
} from './mobileDriver.js';
export { BaseMobilePage } from './baseMobilePage.js';
