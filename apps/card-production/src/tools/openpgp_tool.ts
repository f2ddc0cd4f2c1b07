import { NativeTool, ToolContext } from './native_tool';
import { OpenPgpAppletTool } from './types';

/**
 * OpenSC's `openpgp-tool`.
 */
export class OpenPgpTool extends NativeTool implements OpenPgpAppletTool {
  constructor(context: ToolContext) {
    super('openpgp-tool', context);
  }

  async initialize({ wait }: { wait: boolean }): Promise<void> {
    await this.runChecked([
      '--card-info',
      ...this.verboseArgs(),
      ...(wait ? ['--wait'] : []),
    ]);
  }
}
