import pc from 'picocolors';

export interface VerificationResult {
  manifests: string[];
  conflicts: string[];
}

export interface CheckEntry {
  input: string;
  valid: boolean;
  error?: string;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderVerification(result: VerificationResult): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          { status: result.conflicts.length === 0 ? 'SUCCESS' : 'FAILURE', ...result },
          null,
          2,
        ),
      );
      return;
    }

    if (result.conflicts.length === 0) {
      console.log(pc.green('✅ No plugin version conflicts.'));
      console.log(pc.gray(`  Checked ${result.manifests.length} manifest(s).`));
      return;
    }

    console.log(pc.red(`❌ Found ${result.conflicts.length} plugin version conflict(s):`));
    result.conflicts.forEach((message) => console.log(`  - ${message}`));
  }

  renderCheck(entries: CheckEntry[]): void {
    if (this.isJson) {
      console.log(JSON.stringify({ plugins: entries }, null, 2));
      return;
    }

    for (const entry of entries) {
      if (entry.valid) {
        console.log(`${pc.green('✔')} ${entry.input}`);
      } else {
        console.log(`${pc.red('✖')} ${entry.input}: ${entry.error ?? 'invalid'}`);
      }
    }
  }
}
