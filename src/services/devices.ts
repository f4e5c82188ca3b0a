import type { TriageStore } from '../db/index.js';
import type { Logger } from '../logger.js';
import type { CallerIdentity, DeviceRegistration } from '../models/types.js';

export interface DeviceRegistrationResult {
  device: DeviceRegistration;
  created: boolean;
}

export class DeviceService {
  constructor(
    private readonly store: TriageStore,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Idempotent per (user, token) */
  async register(caller: CallerIdentity, token: string): Promise<DeviceRegistrationResult> {
    const [existing] = await this.store.devices.query({ where: { userId: caller.id, token }, limit: 1 });
    if (existing) {
      return { device: existing, created: false };
    }

    const device = await this.store.devices.insert({
      id: this.store.devices.newId(),
      userId: caller.id,
      role: caller.role,
      token,
      registeredAt: this.now().toISOString(),
    });
    this.logger.info({ userId: caller.id, role: caller.role }, 'Device registered');
    return { device, created: true };
  }
}
