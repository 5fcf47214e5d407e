/**
 * Base Web Page
 * Browser-only operations on top of BasePage: navigation relative to the
 * configured target, frames, and the pointer gestures of a desktop browser.
 */

import { BasePage, describeLocator, type LocatorInput } from '@uipom/core';

export class BaseWebPage extends BasePage {
  /** Navigates to `path`, resolved against `config.target`. Absolute URLs are used as given. */
  async openUrl(path = ''): Promise<void> {
    const url = new URL(path, this.config.target).toString();
    await this.step(`openUrl(${url})`, () => this.driver.navigate(url));
  }

  /** Types into the element without clearing it first. */
  async sendKeys(locator: LocatorInput, text: string): Promise<void> {
    await this.act(locator, { type: 'type', text });
  }

  currentUrl(): Promise<string> {
    return this.step('currentUrl', () => this.driver.currentUrl());
  }

  title(): Promise<string> {
    return this.step('title', () => this.driver.title());
  }

  /** Waits for the frame element, then scopes later lookups to it. */
  async switchToFrame(frame: LocatorInput): Promise<void> {
    const locator = this.locator(frame);
    await this.step(`switchToFrame(${describeLocator(locator)})`, async () => {
      await this.locate(locator, {});
      await this.driver.switchToFrame(locator);
    });
  }

  async switchToDefaultContent(): Promise<void> {
    await this.step('switchToDefaultContent', () => this.driver.switchToFrame(null));
  }

  async clickAndHold(locator: LocatorInput, holdMs?: number): Promise<void> {
    await this.act(locator, { type: 'clickAndHold', holdMs });
  }

  async doubleClick(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'doubleClick' });
  }

  async hover(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'hover' });
  }

  async contextClick(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'contextClick' });
  }

  async dragAndDrop(source: LocatorInput, target: LocatorInput): Promise<void> {
    const from = this.locator(source);
    const to = this.locator(target);
    await this.step(`dragAndDrop(${describeLocator(from)} -> ${describeLocator(to)})`, async () => {
      const dragged = await this.locate(from, {});
      const dropZone = await this.locate(to, {});
      await this.driver.perform(dragged, { type: 'dragTo', target: dropZone });
    });
  }
}
