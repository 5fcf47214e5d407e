/**
 * Base Mobile Page
 * Touch operations for native app screens. `doubleTap` and `dragAndDrop`
 * drive the W3C Actions API; the `*Gesture` variants use Appium's
 * `mobile:` gesture commands, which some automation backends handle better.
 */

import { BasePage, describeLocator, type LocatorInput } from '@uipom/core';

export class BaseMobilePage extends BasePage {
  async tap(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'tap' });
  }

  async typeText(locator: LocatorInput, text: string, clear = true): Promise<void> {
    await this.act(locator, { type: 'type', text, clear });
  }

  async doubleTap(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'doubleTap' });
  }

  async doubleTapGesture(locator: LocatorInput): Promise<void> {
    await this.act(locator, { type: 'doubleTapGesture' });
  }

  async longPress(locator: LocatorInput, holdMs?: number): Promise<void> {
    await this.act(locator, { type: 'clickAndHold', holdMs });
  }

  async dragAndDrop(source: LocatorInput, target: LocatorInput): Promise<void> {
    await this.drag('dragAndDrop', source, target, 'dragTo');
  }

  async dragGesture(source: LocatorInput, target: LocatorInput): Promise<void> {
    await this.drag('dragGesture', source, target, 'dragGesture');
  }

  private async drag(
    name: string,
    source: LocatorInput,
    target: LocatorInput,
    type: 'dragTo' | 'dragGesture'
  ): Promise<void> {
    const from = this.locator(source);
    const to = this.locator(target);
    await this.step(`${name}(${describeLocator(from)} -> ${describeLocator(to)})`, async () => {
      const dragged = await this.locate(from, {});
      const dropZone = await this.locate(to, {});
      await this.driver.perform(dragged, { type, target: dropZone });
    });
  }
}
