/**
 * Driver Surface
 *
 * Implements the orchestrator's step collaborator on top of any
 * SessionDriver, steered entirely by a SurfaceProfile. Nothing in here
 * knows about a particular target application.
 */

import { CredentialsRejectedError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { ActionSurface } from '../orchestration/types.js';
import type { SurfaceProfile } from '../schemas/index.js';
import type {
  Credentials,
  RealAction,
  SignalKind,
  StatusSnapshot,
  SurfaceSignal,
} from '../types/index.js';
import type { SessionDriver } from './driver.js';

export interface DriverSurfaceOptions {
  logger?: Logger;
  now?: () => Date;
}

const SIGNAL_KINDS: readonly SignalKind[] = ['success', 'failure', 'notice'];

function displayText(text: string | null): string | null {
  const trimmed = text?.trim();
  return trimmed ? trimmed : null;
}

export class DriverSurface implements ActionSurface {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly driver: SessionDriver,
    private readonly profile: SurfaceProfile,
    options?: DriverSurfaceOptions
  ) {
    this.logger = (options?.logger ?? rootLogger).child('surface');
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Fill and submit the login form
   *
   * @throws {CredentialsRejectedError} when the rejection marker shows
   * @throws {DriverError} when the page never settles either way
   */
  async authenticate(credentials: Credentials): Promise<void> {
    const { login } = this.profile;

    await this.driver.navigateTo(login.url);
    await this.driver.waitForElement(login.usernameSelector, login.timeoutMs);

    if (login.organizationSelector && credentials.organization) {
      await this.driver.fill(login.organizationSelector, credentials.organization);
    }
    await this.driver.fill(login.usernameSelector, credentials.username);
    await this.driver.fill(login.passwordSelector, credentials.password);
    await this.driver.click(login.submitSelector);

    try {
      await this.driver.waitForElement(login.successSelector, login.timeoutMs);
    } catch (error) {
      if (login.rejectionSelector && (await this.driver.isVisible(login.rejectionSelector))) {
        const reason = displayText(await this.driver.readText(login.rejectionSelector));
        throw new CredentialsRejectedError(
          reason ? `credentials rejected: ${reason}` : 'credentials rejected'
        );
      }
      throw error;
    }

    this.logger.info('Authenticated', { username: credentials.username });
  }

  async navigate(): Promise<void> {
    const { navigation } = this.profile;

    if (navigation.url) {
      await this.driver.navigateTo(navigation.url);
    }
    if (navigation.entrySelector) {
      await this.driver.click(navigation.entrySelector);
    }
    await this.driver.waitForElement(navigation.readySelector, navigation.timeoutMs);
  }

  async acquirePosition(): Promise<void> {
    const { positioning } = this.profile;
    if (!positioning) {
      return;
    }

    await this.driver.click(positioning.triggerSelector);
    if (positioning.readySelector) {
      await this.driver.waitForElement(positioning.readySelector, positioning.timeoutMs);
    }
  }

  async readStatus(): Promise<StatusSnapshot> {
    const { status } = this.profile;

    const [enterVisible, exitVisible] = await Promise.all([
      this.driver.isVisible(status.enterButton),
      this.driver.isVisible(status.exitButton),
    ]);
    const enterAvailable = enterVisible && (await this.driver.isEnabled(status.enterButton));
    const exitAvailable = exitVisible && (await this.driver.isEnabled(status.exitButton));

    return {
      enterAvailable,
      exitAvailable,
      pageLoaded: status.pageTitle
        ? await this.driver.isVisible(status.pageTitle)
        : enterVisible || exitVisible,
      positionReady: status.positionReady ? await this.driver.isVisible(status.positionReady) : true,
      remoteTime: await this.readOptional(status.remoteTime),
      remoteDate: await this.readOptional(status.remoteDate),
      locationText: await this.readOptional(status.location),
      capturedAt: this.now().toISOString(),
    };
  }

  async readSignals(): Promise<SurfaceSignal[]> {
    const signals: SurfaceSignal[] = [];
    for (const kind of SIGNAL_KINDS) {
      for (const selector of this.profile.signals[kind]) {
        const texts = await this.driver.readAllText(selector);
        for (const text of texts) {
          const trimmed = displayText(text);
          if (trimmed) {
            signals.push({ kind, text: trimmed });
          }
        }
      }
    }
    return signals;
  }

  async performAction(action: RealAction): Promise<void> {
    const { status } = this.profile;
    const selector = action === 'enter' ? status.enterButton : status.exitButton;
    this.logger.info('Clicking action button', { action, selector });
    await this.driver.click(selector);
  }

  captureScreenshot(label: string): Promise<string> {
    return this.driver.captureScreenshot(label);
  }

  private async readOptional(selector: string | undefined): Promise<string | null> {
    if (!selector) {
      return null;
    }
    try {
      return displayText(await this.driver.readText(selector));
    } catch (error) {
      this.logger.debug('Display field unreadable', { selector, error: errorMessage(error) });
      return null;
    }
  }
}

