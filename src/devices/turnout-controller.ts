/**
 * Turnout Controller
 *
 * Drives turnout servos on the node. The servo for a channel is opened
 * on its first command and reused afterwards.
 */

import { getLogger } from '../logger';
import { ResourceError, errorMessage } from '../errors';
import { TurnoutSetCommand } from '../protocol/commands';
import { PeripheralRegistry } from '../hardware/peripheral-registry';
import { HardwareBackend, ServoDriver } from '../hardware/types';

const log = getLogger('Turnouts');

export class TurnoutController {
  private readonly backend: HardwareBackend;
  private readonly servos = new PeripheralRegistry<ServoDriver>('servo');
  private readonly positions = new Map<number, boolean>();

  constructor(backend: HardwareBackend) {
    this.backend = backend;
  }

  /**
   * Move the servo to the closed angle (active) or the thrown angle.
   * Returns the angle written.
   */
  setPosition(cmd: Pick<TurnoutSetCommand, 'servoAddress' | 'thrownAngle' | 'closedAngle' | 'active'>): number {
    const angle = cmd.active ? cmd.closedAngle : cmd.thrownAngle;

    let servo: ServoDriver;
    try {
      servo = this.servos.acquire(cmd.servoAddress, (channel) => this.backend.openServo(channel));
    } catch (err) {
      throw new ResourceError(
        'servo-init-failed',
        `Could not initialize servo ${cmd.servoAddress}: ${errorMessage(err)}`,
      );
    }

    try {
      servo.setAngle(angle);
    } catch (err) {
      throw new ResourceError(
        'servo-write-failed',
        `Could not move servo ${cmd.servoAddress} to ${angle}: ${errorMessage(err)}`,
      );
    }

    this.positions.set(cmd.servoAddress, cmd.active);
    log.info({ servo: cmd.servoAddress, angle, position: cmd.active ? 'closed' : 'thrown' }, 'Turnout moved');
    return angle;
  }

  /** Last position written to a servo: true = closed */
  position(servoAddress: number): boolean | undefined {
    return this.positions.get(servoAddress);
  }

  get servoChannels(): number[] {
    return this.servos.addresses();
  }
}
