import { setTimeout as delay } from 'timers/promises';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';

export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  getPid(): number {
    return process.pid;
  }

  async sleep(ms: number): Promise<void> {
    if (ms > 0) await delay(ms);
  }
}
