import { LogDispositionStandardTypes, LogEventId } from '@cardprod/logging';
import { GpParameters } from '../params/gp_parameters';
import { NativeTool, ToolContext } from './native_tool';
import { GlobalPlatformManager } from './types';

/**
 * GlobalPlatformPro (`gp`), usually run as `java -jar gp.jar`.
 */
export class GlobalPlatformPro
  extends NativeTool
  implements GlobalPlatformManager
{
  constructor(context: ToolContext) {
    super('gp', context);
  }

  async uninstall(
    capFile: string,
    {
      auth,
      allowFailure = true,
    }: { auth: GpParameters; allowFailure?: boolean }
  ): Promise<boolean> {
    auth.validate();
    const result = await this.run([
      ...this.verboseArgs(),
      '--key',
      auth.key,
      '--uninstall',
      capFile,
    ]);
    if (result.exitCode === 0) {
      return true;
    }
    if (!allowFailure) {
      throw this.failure(result);
    }
    await this.logger.log(LogEventId.AppletUninstall, 'system', {
      message: `Could not uninstall ${capFile}, maybe because it is not installed; continuing anyway`,
      disposition: LogDispositionStandardTypes.Failure,
      capFile,
      exitCode: result.exitCode,
    });
    return false;
  }

  async install(
    capFile: string,
    { auth, instanceAid }: { auth: GpParameters; instanceAid?: string }
  ): Promise<void> {
    auth.validate();
    await this.runChecked([
      ...this.verboseArgs(),
      '--key',
      auth.key,
      '--install',
      capFile,
      '--default',
      ...(instanceAid === undefined ? [] : ['--create', instanceAid]),
    ]);
  }

  async lockCard({
    newParams,
    currentParams = GpParameters.factoryDefault(),
  }: {
    newParams: GpParameters;
    currentParams?: GpParameters;
  }): Promise<void> {
    newParams.validate();
    currentParams.validate();
    await this.runChecked([
      ...this.verboseArgs(),
      '--key',
      currentParams.key,
      '--lock',
      newParams.key,
    ]);
  }
}
