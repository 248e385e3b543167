/**
 * Route switching through mwan3
 */

import { RouteSwitch, StepResult } from '../core/collaborators';
import { errorMessage } from '../core/errors';
import { Exec } from '../core/types';

export class Mwan3RouteSwitch implements RouteSwitch {
  constructor(
    private readonly exec: Exec,
    private readonly command: string = 'mwan3'
  ) {}

  ifdown(iface: string): Promise<StepResult> {
    return this.run('ifdown', iface);
  }

  ifup(iface: string): Promise<StepResult> {
    return this.run('ifup', iface);
  }

  private async run(verb: 'ifdown' | 'ifup', iface: string): Promise<StepResult> {
    try {
      await this.exec(`${this.command} ${verb} ${iface}`);
      return { iface, ok: true };
    } catch (error) {
      return { iface, ok: false, error: errorMessage(error) };
    }
  }
}
