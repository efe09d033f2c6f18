import { setTimeout as sleep } from 'timers/promises';

export interface DelayPolicy {
  wait(): Promise<void>;
}

export class NoDelay implements DelayPolicy {
  async wait(): Promise<void> {}
}

export class FixedDelay implements DelayPolicy {
  constructor(readonly ms: number) {}

  async wait(): Promise<void> {
    await sleep(this.ms);
  }
}

export function delayPolicyFor(ms: number): DelayPolicy {
  return ms > 0 ? new FixedDelay(ms) : new NoDelay();
}
