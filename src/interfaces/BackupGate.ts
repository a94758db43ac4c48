/**
 * The newest summary found on disk
 */
export interface LatestSummary {
  fileName: string;

  /** Raw "timestamp" field, undefined when missing or unreadable */
  timestamp: unknown;

  /** Set when the file could not be read or parsed */
  readError?: string;
}

export type GateDecision =
  | {
      action: 'proceed';
      reason: 'no-previous-backup' | 'unreadable-timestamp' | 'threshold-elapsed' | 'forced';
      hoursSinceLastBackup?: number;
    }
  | {
      action: 'skip';
      hoursSinceLastBackup: number;
      remainingHours: number;
    };
