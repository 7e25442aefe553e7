import { NativeLocationBackend } from '../nativeLocation';
import { RawFix } from '../../schemas/nativeFix.schema';
import { CommandRunner, runCommand } from '../../utils/command';
import { parseFixOutput } from './fixOutput';

export const CORE_LOCATION_CLI = 'CoreLocationCLI';

// CoreLocationCLI asks for permission and starts updates itself, and exits non-zero when denied
export class CoreLocationBackend implements NativeLocationBackend {
  readonly platform = 'darwin' as const;

  constructor(private readonly run: CommandRunner = runCommand) {}

  async servicesEnabled(): Promise<boolean> {
    try {
      await this.run('which', [CORE_LOCATION_CLI]);
      return true;
    } catch {
      return false;
    }
  }

  async currentFix(): Promise<RawFix | null> {
    const stdout = await this.run(CORE_LOCATION_CLI, ['--json']);
    return parseFixOutput(stdout);
  }
}
