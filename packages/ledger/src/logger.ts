/**
 * @tradeledger/ledger — Logger plumbing.
 *
 * Ledger engines take an optional pino logger; without one they log
 * nowhere.
 */

import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

/** Logger used when the caller supplies none. */
export const silentLogger: Logger = pino({ level: "silent" });
