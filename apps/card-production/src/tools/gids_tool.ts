import { GidsAppletParameters } from '../params/gids_parameters';
import { NativeTool, ToolContext } from './native_tool';
import { GidsAppletTool } from './types';

/**
 * OpenSC's `gids-tool`.
 */
export class GidsTool extends NativeTool implements GidsAppletTool {
  constructor(context: ToolContext) {
    super('gids-tool', context);
  }

  async initialize(
    params: GidsAppletParameters,
    { wait }: { wait: boolean }
  ): Promise<void> {
    params.validate();
    await this.runChecked([
      ...this.verboseArgs(),
      ...(wait ? ['--wait'] : []),
      '--initialize',
      '--admin-key',
      params.adminKey,
      '--pin',
      params.pin,
      '--serial-number',
      params.serialNumber,
    ]);
  }
}
