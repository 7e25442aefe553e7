import net from 'net';
import { NativeLocationBackend } from '../nativeLocation';
import { RawFix } from '../../schemas/nativeFix.schema';
import { GpsdMessageSchema, PollSchema, Tpv, TpvSchema } from '../../schemas/gpsd.schema';
import { GPSD_HOST, GPSD_PORT, GPSD_TIMEOUT_MS } from '../../constants';

const WATCH_COMMAND = '?WATCH={"enable":true,"json":true};\n';
const POLL_COMMAND = '?POLL;\n';

// gpsd modes: 0/1 no fix, 2 = 2D, 3 = 3D
const MIN_FIX_MODE = 2;

export interface GpsdOptions {
  host?: string;
  port?: number;
  timeoutMs?: number;
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function toFix(tpv: Tpv): RawFix | null {
  if (tpv.mode < MIN_FIX_MODE || tpv.lat === undefined || tpv.lon === undefined) {
    return null;
  }
  return { latitude: tpv.lat, longitude: tpv.lon };
}

/**
 * Picks the freshest usable fix out of a gpsd session transcript.
 * A POLL report wins over streamed TPV messages.
 */
export function parseGpsdResponse(transcript: string): RawFix | null {
  let fix: RawFix | null = null;

  for (const line of transcript.split('\n')) {
    const message = GpsdMessageSchema.safeParse(parseLine(line.trim()));
    if (!message.success) continue;

    if (message.data.class === 'POLL') {
      const poll = PollSchema.safeParse(message.data);
      if (!poll.success) continue;

      for (const entry of poll.data.tpv) {
        const tpv = TpvSchema.safeParse(entry);
        const candidate = tpv.success ? toFix(tpv.data) : null;
        if (candidate) return candidate;
      }
    }

    if (message.data.class === 'TPV') {
      const tpv = TpvSchema.safeParse(message.data);
      fix = (tpv.success ? toFix(tpv.data) : null) ?? fix;
    }
  }

  return fix;
}

function completeLines(transcript: string): string[] {
  // Whatever follows the last newline may still be arriving
  return transcript.split('\n').slice(0, -1);
}

function hasMessage(className: string): (transcript: string) => boolean {
  return (transcript) =>
    completeLines(transcript).some((line) => {
      const message = GpsdMessageSchema.safeParse(parseLine(line.trim()));
      return message.success && message.data.class === className;
    });
}

const hasVersionBanner = hasMessage('VERSION');
const hasWatchAck = hasMessage('WATCH');
const hasPollReport = hasMessage('POLL');

/**
 * gpsd daemon over its JSON socket protocol. gpsd has no permission model;
 * a fresh fix is asked for by opening a watch, which powers up the receiver.
 */
export class GpsdBackend implements NativeLocationBackend {
  readonly platform = 'linux' as const;
  private readonly host: string;
  private readonly port: number;
  private readonly timeoutMs: number;

  constructor(options: GpsdOptions = {}) {
    this.host = options.host ?? GPSD_HOST;
    this.port = options.port ?? GPSD_PORT;
    this.timeoutMs = options.timeoutMs ?? GPSD_TIMEOUT_MS;
  }

  async servicesEnabled(): Promise<boolean> {
    // gpsd greets every client with a VERSION banner
    return hasVersionBanner(await this.exchange('', hasVersionBanner));
  }

  async currentFix(): Promise<RawFix | null> {
    const transcript = await this.exchange(WATCH_COMMAND + POLL_COMMAND, hasPollReport);
    return parseGpsdResponse(transcript);
  }

  async requestFix(): Promise<void> {
    await this.exchange(WATCH_COMMAND, hasWatchAck);
  }

  /**
   * Sends `commands` and collects replies until `done` holds, the peer
   * closes, or `timeoutMs` has passed since connecting.
   */
  private exchange(commands: string, done: (transcript: string) => boolean): Promise<string> {
    return new Promise((resolve, reject) => {
      let transcript = '';
      let settled = false;
      const socket = net.createConnection({ host: this.host, port: this.port });

      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        socket.destroy();
        if (err) {
          reject(err);
        } else {
          resolve(transcript);
        }
      };

      // Total bound: under WATCH gpsd keeps the socket busy with TPVs
      const deadline = setTimeout(() => finish(), this.timeoutMs);

      socket.setEncoding('utf8');

      socket.on('connect', () => {
        if (commands) socket.write(commands);
      });

      socket.on('data', (chunk: Buffer | string) => {
        transcript += chunk.toString();
        if (done(transcript)) finish();
      });

      socket.on('error', (err) => finish(err));
      socket.on('close', () => finish());
    });
  }
}
