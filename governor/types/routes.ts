/**
 * Route Module Types
 */

import type { Express } from 'express';
import type { CacheFacade } from '../services/CacheFacade.js';
import type { QuotaLedger } from '../services/QuotaLedger.js';
import type { RetentionScheduler } from '../services/RetentionScheduler.js';

/**
 * Services handed to every route module
 */
export interface RouteContext {
  cache: CacheFacade;
  ledger: QuotaLedger;
  scheduler: RetentionScheduler;
}

export interface RouteModule {
  id: string;
  handler: (app: Express, context: RouteContext) => void;
}
