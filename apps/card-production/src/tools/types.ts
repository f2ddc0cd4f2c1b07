import { KeyLoadingRequest } from '../config/procedure_config';
import { GidsAppletParameters } from '../params/gids_parameters';
import { GpParameters } from '../params/gp_parameters';
import { OpenPgpPins } from '../params/openpgp_parameters';

/**
 * Card manager operations, authenticated with a GlobalPlatform key.
 */
export interface GlobalPlatformManager {
  /**
   * Resolves to whether the applet was uninstalled. With `allowFailure`, the
   * default, a failure (usually because the applet isn't there) is logged
   * instead of thrown.
   */
  uninstall(
    capFile: string,
    options: { auth: GpParameters; allowFailure?: boolean }
  ): Promise<boolean>;

  /**
   * Installs the applet in `capFile` as the default selected applet.
   */
  install(
    capFile: string,
    options: { auth: GpParameters; instanceAid?: string }
  ): Promise<void>;

  /**
   * Changes the lock key to `newParams`, authenticating with `currentParams`
   * or the factory default key.
   */
  lockCard(options: {
    newParams: GpParameters;
    currentParams?: GpParameters;
  }): Promise<void>;
}

export interface GidsAppletTool {
  initialize(
    params: GidsAppletParameters,
    options: { wait: boolean }
  ): Promise<void>;
}

export interface KeyImporter {
  importKey(
    params: GidsAppletParameters,
    request: KeyLoadingRequest
  ): Promise<void>;
}

export interface CertificateEnumerator {
  /**
   * Labels of the certificates on the card, in the order the card lists them.
   */
  enumerateCertificates(): Promise<string[]>;
}

export interface OpenPgpAppletTool {
  /**
   * Waits for the card and reads the applet's card info, which finishes
   * setting up a freshly installed applet.
   */
  initialize(options: { wait: boolean }): Promise<void>;
}

export interface PinChanger {
  /**
   * Changes both PINs from `current`, or the factory defaults, to `desired`.
   */
  changePins(options: {
    desired: OpenPgpPins;
    current?: OpenPgpPins;
  }): Promise<void>;
}

/**
 * Tells the operator to take the card out and put it back in.
 */
export type ReinsertPrompt = () => Promise<void>;

export interface GidsToolkit {
  readonly capFile: string;
  readonly gp: GlobalPlatformManager;
  readonly gids: GidsAppletTool;
  readonly keyImporter: KeyImporter;
  readonly certificates: CertificateEnumerator;
  readonly promptReinsert: ReinsertPrompt;
}

export interface SmartPgpToolkit {
  readonly capFile: string;
  readonly gp: GlobalPlatformManager;
  readonly openPgp: OpenPgpAppletTool;
  readonly pinChanger: PinChanger;
  readonly promptReinsert: ReinsertPrompt;
}
