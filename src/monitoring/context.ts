// This module defines the collaborators and limits every monitoring query runs against.

import type { LogReader, UnitLister } from '../types/domain.js';
import type { AppLogger } from '../utils/logger.js';

export interface MonitoringContext {
  unitLister: UnitLister;
  logReader: LogReader;
  adapterTimeoutMs: number;
  logger: AppLogger;
  now: () => Date;
}
