/**
 * Native functions installed into every root environment.
 */

import type { Environment } from './environment';
import { NativeFunction } from './callable';
import { mkNative, mkNumber } from './values';

/** Seconds since the Unix epoch, as a Number. */
export const CLOCK = new NativeFunction('clock', 0, () => mkNumber(Date.now() / 1000));

export const NATIVES: readonly NativeFunction[] = [CLOCK];

/**
 * Register native functions into the given environment.
 */
export function registerBuiltins(env: Environment, natives: readonly NativeFunction[] = NATIVES): void {
  for (const native of natives) {
    env.define(native.name, mkNative(native));
  }
}
