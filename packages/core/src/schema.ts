/**
 * Core Schema Types for uipom
 * Platform-neutral contracts for locators, sessions, actions and results
 */

export type Platform = 'web' | 'mobile';

export type LocatorStrategy =
  | 'css'
  | 'xpath'
  | 'id'
  | 'name'
  | 'text'
  | 'testId'
  | 'accessibilityId'
  | 'className';

export interface Locator {
  strategy: LocatorStrategy;
  value: string;
}

/** A raw locator string such as `#login` or `~submit_button`, or a parsed Locator. */
export type LocatorInput = string | Locator;

/**
 * Opaque element handle minted by a DriverHandle. Only the handle that
 * produced it accepts it back in `perform`.
 */
export interface ElementRef {
  readonly locator: Locator;
  readonly index: number;
  isDisplayed(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
}

export type ElementAction =
  | { type: 'click' }
  | { type: 'type'; text: string; clear?: boolean }
  | { type: 'clear' }
  | { type: 'doubleClick' }
  | { type: 'contextClick' }
  | { type: 'hover' }
  | { type: 'clickAndHold'; holdMs?: number }
  | { type: 'dragTo'; target: ElementRef }
  | { type: 'tap' }
  | { type: 'doubleTap' }
  | { type: 'doubleTapGesture' }
  | { type: 'dragGesture'; target: ElementRef };

export type ElementActionType = ElementAction['type'];

export interface DriverHandle {
  readonly platform: Platform;
  readonly sessionId: string;
  readonly released: boolean;
  /** Immediate lookup, no waiting. An empty array means nothing matched yet. */
  findElements(locator: Locator): Promise<ElementRef[]>;
  perform(element: ElementRef, action: ElementAction): Promise<void>;
  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  title(): Promise<string>;
  /** `null` returns to the top-level document. */
  switchToFrame(frame: Locator | null): Promise<void>;
  screenshot(): Promise<Buffer>;
  pageSource(): Promise<string>;
  release(): Promise<void>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEvent {
  timestamp: string;
  level: LogLevel;
  message: string;
  scope?: string;
  attachment?: string;
  data?: Record<string, unknown>;
}

export type ActionErrorKind =
  | 'locator-not-found'
  | 'timeout'
  | 'driver-disconnected'
  | 'assertion-failed'
  | 'unsupported-action'
  | 'action-failed';

export interface StepResult {
  stepId: string;
  action: string;
  ok: boolean;
  startedAt: string;
  finishedAt: string;
  error?: { kind: ActionErrorKind | 'driver-initialization'; message: string };
  evidence?: {
    screenshotPath?: string;
    pageSourcePath?: string;
  };
}

export interface RunResult {
  runId: string;
  platform: Platform;
  scenario: string;
  target: string;
  startedAt: string;
  finishedAt: string;
  ok: boolean;
  steps: StepResult[];
  summary: {
    total: number;
    passed: number;
    failed: number;
  };
}
