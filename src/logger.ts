/**
 * Structured logger for analysis runs
 * Captures every pipeline stage: config, posts, scoring, patterns, signals
 *
 * Enable console echo: VERBOSE_LOGGING=true
 */

const VERBOSE = process.env.VERBOSE_LOGGING === 'true';

type LogLevel = 'info' | 'debug' | 'warn' | 'error';

export type LogCategory = 'CONFIG' | 'POSTS' | 'SCORER' | 'PATTERN' | 'SIGNAL' | 'RANKER' | 'PIPELINE';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  operation: string;
  details?: Record<string, unknown>;
}

class Logger {
  private logs: LogEntry[] = [];

  private log(level: LogLevel, category: LogCategory, operation: string, details?: Record<string, unknown>) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      operation,
      details,
    };

    this.logs.push(entry);

    if (VERBOSE) {
      const detailsStr = details ? ` ${JSON.stringify(details, null, 2)}` : '';
      console.error(`[${category}] ${operation}${detailsStr}`);
    }
  }

  // Configuration
  configLoaded(details: { targetHandle: string; minConfidence: number; keywordCount: number }) {
    this.log('info', 'CONFIG', 'Loaded', details);
  }

  configRejected(issues: string[]) {
    this.log('error', 'CONFIG', 'Rejected', { issues });
  }

  // Post store
  postsSelected(details: { received: number; originals: number; kept: number }) {
    this.log('info', 'POSTS', 'Selected', details);
  }

  postsLoaded(details: { source: string; count: number }) {
    this.log('info', 'POSTS', 'Loaded', details);
  }

  // Scoring
  scoreFallback(details: { postId: string; reason: string }) {
    this.log('warn', 'SCORER', 'Neutral Fallback', details);
  }

  scoresComputed(details: { posts: number; withKeywords: number }) {
    this.log('debug', 'SCORER', 'Scored', details);
  }

  // Pattern detection
  patternsDetected(details: {
    posts: number;
    windows: number;
    bursts: number;
    highEngagementHours: number[];
  }) {
    this.log('info', 'PATTERN', 'Context Built', details);
  }

  inputRejected(details: { reason: string; postId?: string; index?: number }) {
    this.log('error', 'PATTERN', 'Input Rejected', details);
  }

  // Signals
  candidatesGenerated(details: { posts: number; candidates: number }) {
    this.log('info', 'SIGNAL', 'Candidates Generated', details);
  }

  signalsRanked(details: { candidates: number; kept: number; minConfidence: number }) {
    this.log('info', 'RANKER', 'Ranked', details);
  }

  // Runs
  runCompleted(details: { targetHandle: string; posts: number; signals: number }) {
    this.log('info', 'PIPELINE', 'Run Completed', details);
  }

  // Errors
  error(category: LogCategory, operation: string, error: Error | string) {
    this.log('error', category, operation, {
      error: error instanceof Error ? error.message : error,
    });
  }

  // Get all logs
  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  // Export logs
  exportLogs(format: 'json' | 'text' = 'json'): string {
    if (format === 'text') {
      return this.logs
        .map(
          entry =>
            `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.category}] ${entry.operation}${entry.details ? ` ${JSON.stringify(entry.details)}` : ''}`,
        )
        .join('\n');
    }
    return JSON.stringify(this.logs, null, 2);
  }

  // Clear logs
  clear() {
    this.logs = [];
  }
}

// Singleton instance
export const logger = new Logger();
