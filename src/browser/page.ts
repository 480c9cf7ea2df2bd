// ── Page handle contract ─────────────────────────────────────
// The slice of Playwright's Page and Locator the executor drives.
// A real `Page` satisfies it structurally; tests hand in stubs.

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface ResponseHandle {
  status(): number;
}

export interface LocatorHandle {
  waitFor(options?: {
    state?: 'attached' | 'detached' | 'visible' | 'hidden';
    timeout?: number;
  }): Promise<void>;
  scrollIntoViewIfNeeded(options?: { timeout?: number }): Promise<void>;
  click(options?: { timeout?: number }): Promise<void>;
  hover(options?: { timeout?: number }): Promise<void>;
  focus(options?: { timeout?: number }): Promise<void>;
  clear(options?: { timeout?: number }): Promise<void>;
  pressSequentially(
    text: string,
    options?: { delay?: number; timeout?: number },
  ): Promise<void>;
  inputValue(options?: { timeout?: number }): Promise<string>;
  innerText(options?: { timeout?: number }): Promise<string>;
  isVisible(): Promise<boolean>;
  count(): Promise<number>;
  nth(index: number): LocatorHandle;
  first(): LocatorHandle;
}

export interface PageHandle {
  goto(
    url: string,
    options?: { timeout?: number; waitUntil?: LoadState | 'commit' },
  ): Promise<ResponseHandle | null>;
  waitForLoadState(
    state?: LoadState,
    options?: { timeout?: number },
  ): Promise<void>;
  locator(selector: string): LocatorHandle;
  getByText(text: string | RegExp, options?: { exact?: boolean }): LocatorHandle;
  textContent(selector: string, options?: { timeout?: number }): Promise<string | null>;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer>;
  url(): string;
  keyboard: {
    press(key: string, options?: { delay?: number }): Promise<void>;
  };
  mouse: {
    wheel(deltaX: number, deltaY: number): Promise<void>;
  };
}
