import { NativeLocationBackend } from '../nativeLocation';
import { RawFix } from '../../schemas/nativeFix.schema';
import { CommandRunner, runCommand } from '../../utils/command';
import { parseFixOutput } from './fixOutput';

const WATCHER = [
  'Add-Type -AssemblyName System.Device',
  '$w = New-Object System.Device.Location.GeoCoordinateWatcher',
].join('; ');

export const WINDOWS_SCRIPTS = {
  status: `${WATCHER}; [void]$w.TryStart($false, [TimeSpan]::Zero); $w.Status; $w.Stop()`,
  permission: `${WATCHER}; $w.Permission`,
  requestPermission: `${WATCHER}; $w.Start(); Start-Sleep -Milliseconds 200; $w.Stop()`,
  // Starting the watcher without a prompt makes the service begin resolving a position
  requestFix: `${WATCHER}; [void]$w.TryStart($true, [TimeSpan]::FromMilliseconds(500)); $w.Stop()`,
  fix: [
    WATCHER,
    '[void]$w.TryStart($false, [TimeSpan]::FromMilliseconds(1000))',
    '$l = $w.Position.Location',
    "if ($l.IsUnknown) { 'null' } else { @{ latitude = $l.Latitude; longitude = $l.Longitude } | ConvertTo-Json -Compress }",
    '$w.Stop()',
  ].join('; '),
} as const;

/**
 * Windows Location API (GeoCoordinateWatcher) driven through PowerShell.
 */
export class WindowsLocationBackend implements NativeLocationBackend {
  readonly platform = 'win32' as const;

  constructor(private readonly run: CommandRunner = runCommand) {}

  async servicesEnabled(): Promise<boolean> {
    const status = await this.powershell(WINDOWS_SCRIPTS.status);
    return status !== 'Disabled';
  }

  async isAuthorized(): Promise<boolean> {
    return (await this.powershell(WINDOWS_SCRIPTS.permission)) === 'Granted';
  }

  async requestAuthorization(): Promise<void> {
    await this.powershell(WINDOWS_SCRIPTS.requestPermission);
  }

  async requestFix(): Promise<void> {
    await this.powershell(WINDOWS_SCRIPTS.requestFix);
  }

  async currentFix(): Promise<RawFix | null> {
    return parseFixOutput(await this.powershell(WINDOWS_SCRIPTS.fix));
  }

  private powershell(script: string): Promise<string> {
    return this.run('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', script]);
  }
}
