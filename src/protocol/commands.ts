/**
 * Command Codec
 *
 * Typed commands carried inside frames, and the tokenizer that turns a
 * frame into one of them. Decoding never throws: a frame that does not
 * match the grammar becomes an ErrorCommand with a kebab-case reason.
 *
 *   IN:<gpio>                                     sensor registration
 *   IN:<gpio>:<0|1>                               sensor report
 *   OUT_TO:<servo>[<thrown>][<closed>]:<0|1>      turnout (1 = closed)
 *   OUT_SH:<head>$<board>$R<red>$G<green>:<code>  signal head
 *   ERROR:<reason>:<original>                     diagnostic
 */

import { ProtocolError } from '../errors';

// --- Aspects ---

export type Aspect = 'dark' | 'red' | 'green' | 'flashing-red' | 'flashing-green';

const ASPECT_BY_CODE: Record<string, Aspect> = {
  d: 'dark',
  r: 'red',
  g: 'green',
  fr: 'flashing-red',
  fg: 'flashing-green',
};

const CODE_BY_ASPECT: Record<Aspect, string> = {
  'dark': 'd',
  'red': 'r',
  'green': 'g',
  'flashing-red': 'fr',
  'flashing-green': 'fg',
};

export function aspectFromCode(code: string): Aspect | undefined {
  return ASPECT_BY_CODE[code.toLowerCase()];
}

export function aspectCode(aspect: Aspect): string {
  return CODE_BY_ASPECT[aspect];
}

export function isFlashing(aspect: Aspect): aspect is 'flashing-red' | 'flashing-green' {
  return aspect === 'flashing-red' || aspect === 'flashing-green';
}

// --- Commands ---

export type SensorLevel = 0 | 1;

export interface SensorReportCommand {
  readonly kind: 'sensor-report';
  readonly gpio: number;
  readonly level: SensorLevel;
}

export interface SensorRegisterCommand {
  readonly kind: 'sensor-register';
  readonly gpio: number;
}

export interface TurnoutSetCommand {
  readonly kind: 'turnout-set';
  readonly servoAddress: number;
  readonly thrownAngle: number;
  readonly closedAngle: number;
  /** true = closed */
  readonly active: boolean;
}

export interface SignalHeadSetCommand {
  readonly kind: 'signal-head-set';
  readonly headId: string;
  readonly boardAddress: number;
  readonly redPin: number;
  readonly greenPin: number;
  readonly aspect: Aspect;
}

/** A diagnostic the peer sent us */
export interface DiagnosticCommand {
  readonly kind: 'diagnostic';
  readonly reason: string;
  readonly original: string;
}

/** A frame that failed to decode. Never dispatched to a handler. */
export interface ErrorCommand {
  readonly kind: 'error';
  readonly raw: string;
  readonly reason: string;
  readonly detail: string;
}

export type Command =
  | SensorReportCommand
  | SensorRegisterCommand
  | TurnoutSetCommand
  | SignalHeadSetCommand
  | DiagnosticCommand
  | ErrorCommand;

export type CommandKind = Command['kind'];

// --- Limits ---

export const MAX_SERVO_ADDRESS = 15;
export const MAX_ANGLE = 180;
export const MAX_BOARD_ADDRESS = 0x7f;
export const MAX_EXTENDER_PIN = 15;
/** Highest Raspberry Pi header GPIO (BCM numbering) */
export const MAX_GPIO = 27;

const HEAD_ID_CHARS = /^[A-Za-z0-9_-]+$/;
const DECIMAL = /^[0-9]+$/;
const HEX = /^[0-9a-fA-F]+$/;

// --- Decoding ---

export function decodeCommand(frame: string): Command {
  try {
    return decodeTokens(frame, frame.split(':'));
  } catch (err) {
    if (err instanceof ProtocolError) {
      return { kind: 'error', raw: frame, reason: err.reason, detail: err.message };
    }
    throw err;
  }
}

function decodeTokens(frame: string, tokens: string[]): Command {
  const family = tokens[0].toUpperCase();

  switch (family) {
    case 'IN':
      return decodeSensor(tokens);
    case 'OUT_TO':
      return decodeTurnout(tokens);
    case 'OUT_SH':
      return decodeSignalHead(tokens);
    case 'ERROR':
      return {
        kind: 'diagnostic',
        reason: tokens[1] ?? '',
        original: tokens.slice(2).join(':'),
      };
    default:
      throw new ProtocolError('unknown-command', `Unknown command family "${tokens[0]}" in ${frame}`);
  }
}

function decodeSensor(tokens: string[]): SensorReportCommand | SensorRegisterCommand {
  if (tokens.length === 2) {
    return { kind: 'sensor-register', gpio: parseGpio(tokens[1]) };
  }
  expectTokenCount(tokens, 3);
  const gpio = parseGpio(tokens[1]);
  return { kind: 'sensor-report', gpio, level: parseBit(tokens[2], 'invalid-level', 'sensor level') };
}

function decodeTurnout(tokens: string[]): TurnoutSetCommand {
  expectTokenCount(tokens, 3);
  const servo = parseTurnoutSpec(tokens[1]);
  const active = parseBit(tokens[2], 'invalid-state', 'turnout state') === 1;
  return { kind: 'turnout-set', ...servo, active };
}

export type TurnoutSpec = Pick<TurnoutSetCommand, 'servoAddress' | 'thrownAngle' | 'closedAngle'>;

/** `<servo>[<thrown>][<closed>]`, as used in frames and turnout names */
export function parseTurnoutSpec(spec: string): TurnoutSpec {
  const open = spec.indexOf('[');
  if (open === -1 || !spec.endsWith(']')) {
    throw new ProtocolError('malformed-turnout', `Expected <servo>[<thrown>][<closed>], got "${spec}"`);
  }
  const angles = spec.slice(open + 1, -1).split('][');
  if (angles.length !== 2) {
    throw new ProtocolError('malformed-turnout', `Expected two bracketed angles, got "${spec}"`);
  }

  const servoAddress = parseUnsigned(spec.slice(0, open), 'invalid-servo-address', 'servo address');
  checkRange(servoAddress, MAX_SERVO_ADDRESS, 'invalid-servo-address', 'servo address');
  return {
    servoAddress,
    thrownAngle: parseAngle(angles[0]),
    closedAngle: parseAngle(angles[1]),
  };
}

function decodeSignalHead(tokens: string[]): SignalHeadSetCommand {
  expectTokenCount(tokens, 3);
  const wiring = parseSignalHeadSpec(tokens[1]);
  const aspect = aspectFromCode(tokens[2]);
  if (!aspect) {
    throw new ProtocolError('invalid-aspect', `Unknown aspect code "${tokens[2]}"`);
  }
  return { kind: 'signal-head-set', ...wiring, aspect };
}

export type SignalHeadSpec = Pick<SignalHeadSetCommand, 'headId' | 'boardAddress' | 'redPin' | 'greenPin'>;

/** `<head>$<board>$R<red>$G<green>`, as used in frames and signal head names */
export function parseSignalHeadSpec(spec: string): SignalHeadSpec {
  const parts = spec.split('$');
  if (parts.length !== 4) {
    throw new ProtocolError(
      'malformed-signal-head',
      `Expected <head>$<board>$R<red>$G<green>, got "${spec}"`,
    );
  }
  const [headId, boardToken, redToken, greenToken] = parts;

  if (!HEAD_ID_CHARS.test(headId)) {
    throw new ProtocolError('invalid-head-id', `Invalid signal head id "${headId}"`);
  }
  const boardAddress = parseBoardAddress(boardToken);
  const redPin = parsePin(redToken, 'R');
  const greenPin = parsePin(greenToken, 'G');
  if (redPin === greenPin) {
    throw new ProtocolError('duplicate-pins', `Red and green share pin ${redPin}`);
  }
  return { headId, boardAddress, redPin, greenPin };
}

// --- Token helpers ---

function expectTokenCount(tokens: string[], count: number): void {
  if (tokens.length !== count) {
    throw new ProtocolError(
      'wrong-token-count',
      `Expected ${count} ':'-separated tokens, got ${tokens.length}`,
    );
  }
}

function parseUnsigned(token: string, reason: string, what: string): number {
  if (!DECIMAL.test(token)) {
    throw new ProtocolError(reason, `${what} is not an unsigned integer: "${token}"`);
  }
  return Number.parseInt(token, 10);
}

function checkRange(value: number, max: number, reason: string, what: string): void {
  if (value > max) {
    throw new ProtocolError(reason, `${what} ${value} out of range 0-${max}`);
  }
}

function parseBit(token: string, reason: string, what: string): SensorLevel {
  if (token === '0') return 0;
  if (token === '1') return 1;
  throw new ProtocolError(reason, `${what} must be 0 or 1, got "${token}"`);
}

/** Decimal gpio number, shared with sensor names */
export function parseGpio(token: string): number {
  const gpio = parseUnsigned(token, 'invalid-gpio', 'gpio');
  checkRange(gpio, MAX_GPIO, 'invalid-gpio', 'gpio');
  return gpio;
}

function parseAngle(token: string): number {
  const angle = parseUnsigned(token, 'invalid-angle', 'angle');
  checkRange(angle, MAX_ANGLE, 'invalid-angle', 'angle');
  return angle;
}

function parseBoardAddress(token: string): number {
  const digits = token.startsWith('0x') || token.startsWith('0X') ? token.slice(2) : token;
  if (!HEX.test(digits)) {
    throw new ProtocolError('invalid-board-address', `Board address is not hex: "${token}"`);
  }
  const address = Number.parseInt(digits, 16);
  checkRange(address, MAX_BOARD_ADDRESS, 'invalid-board-address', 'board address');
  return address;
}

function parsePin(token: string, prefix: 'R' | 'G'): number {
  if (token.charAt(0).toUpperCase() !== prefix) {
    throw new ProtocolError('invalid-pin', `Expected ${prefix}<pin>, got "${token}"`);
  }
  const pin = parseUnsigned(token.slice(1), 'invalid-pin', 'extender pin');
  checkRange(pin, MAX_EXTENDER_PIN, 'invalid-pin', 'extender pin');
  return pin;
}

// --- Encoding ---

export function formatBoardAddress(address: number): string {
  return '0x' + address.toString(16).padStart(2, '0');
}

export function encodeSensorReport(gpio: number, level: SensorLevel): string {
  return `IN:${gpio}:${level}`;
}

export function encodeSensorRegister(gpio: number): string {
  return `IN:${gpio}`;
}

export function encodeTurnoutSet(cmd: TurnoutSpec & { active: boolean }): string {
  return `OUT_TO:${cmd.servoAddress}[${cmd.thrownAngle}][${cmd.closedAngle}]:${cmd.active ? 1 : 0}`;
}

export function encodeSignalHeadSet(cmd: SignalHeadSpec & { aspect: Aspect }): string {
  return `OUT_SH:${cmd.headId}$${formatBoardAddress(cmd.boardAddress)}` +
    `$R${cmd.redPin}$G${cmd.greenPin}:${aspectCode(cmd.aspect)}`;
}

export function encodeDiagnostic(reason: string, original: string): string {
  return `ERROR:${reason}:${original}`;
}

export function encodeCommand(cmd: Command): string {
  switch (cmd.kind) {
    case 'sensor-report':
      return encodeSensorReport(cmd.gpio, cmd.level);
    case 'sensor-register':
      return encodeSensorRegister(cmd.gpio);
    case 'turnout-set':
      return encodeTurnoutSet(cmd);
    case 'signal-head-set':
      return encodeSignalHeadSet(cmd);
    case 'diagnostic':
      return encodeDiagnostic(cmd.reason, cmd.original);
    case 'error':
      return encodeDiagnostic(cmd.reason, cmd.raw);
  }
}
