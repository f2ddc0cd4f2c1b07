import { NativeTool, ToolContext } from './native_tool';
import { CertificateEnumerator } from './types';

// Greedy, so a label may itself contain brackets
const CERTIFICATE_LABEL_PATTERN = /^X\.509 Certificate \[(.+)\]$/;

/**
 * Picks certificate labels out of `pkcs15-tool --list-certificates` output.
 */
export function parseCertificateLabels(output: string): string[] {
  const labels: string[] = [];
  for (const line of output.split('\n')) {
    const match = CERTIFICATE_LABEL_PATTERN.exec(line.trim());
    if (match?.[1] !== undefined) {
      labels.push(match[1]);
    }
  }
  return labels;
}

/**
 * OpenSC's `pkcs15-tool`.
 */
export class Pkcs15Tool extends NativeTool implements CertificateEnumerator {
  constructor(context: ToolContext) {
    super('pkcs15-tool', context);
  }

  async enumerateCertificates(): Promise<string[]> {
    const { stdout } = await this.runChecked([
      ...this.verboseArgs(),
      '--list-certificates',
    ]);
    return parseCertificateLabels(stdout);
  }
}
