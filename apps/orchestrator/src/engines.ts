/**
 * Engine table for the Driver Factory
 */

import type { DriverEngines } from '@uipom/core';
import { createMobileDriver } from '@uipom/mobile-runner';
import { createWebDriver } from '@uipom/web-runner';

export const defaultEngines: DriverEngines = {
  web: createWebDriver,
  mobile: createMobileDriver,
};
