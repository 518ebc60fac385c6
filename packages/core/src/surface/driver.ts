/**
 * Session driver
 *
 * The one seam between the core and an interactive browser session. Every
 * method is one primitive page operation addressed by selector; any failure
 * surfaces as a DriverError.
 */

export interface SessionDriver {
  open(): Promise<void>;
  close(): Promise<void>;
  navigateTo(url: string): Promise<void>;
  /** Resolves once the element is visible; rejects after `timeoutMs` */
  waitForElement(selector: string, timeoutMs: number): Promise<void>;
  /** Text of the first match, or null when nothing matches */
  readText(selector: string): Promise<string | null>;
  /** Text of every visible match */
  readAllText(selector: string): Promise<string[]>;
  isVisible(selector: string): Promise<boolean>;
  isEnabled(selector: string): Promise<boolean>;
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  /** Returns the path of the stored image */
  captureScreenshot(label: string): Promise<string>;
}
