/**
 * postsignal - Console Reporter
 * Colorful run summary for the CLI
 */

import chalk from 'chalk';
import type { AnalysisResult, PatternContext, Signal, SignalType, Urgency } from './types.js';

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/**
 * Print a section header
 */
function header(title: string, color: typeof chalk.blue): void {
  console.log(color(`\n${'═'.repeat(60)}`));
  console.log(color.bold(`  ${title}`));
  console.log(color('═'.repeat(60)));
}

function formatHours(hours: readonly number[]): string {
  return hours.length > 0 ? hours.map(h => `${String(h).padStart(2, '0')}:00`).join(', ') : 'none';
}

export function typeColor(type: SignalType): typeof chalk.green {
  return type === 'BULLISH' ? chalk.green : type === 'BEARISH' ? chalk.red : chalk.yellow;
}

export function urgencyColor(urgency: Urgency): typeof chalk.red {
  switch (urgency) {
    case 'CRITICAL':
      return chalk.red.bold;
    case 'HIGH':
      return chalk.magenta;
    case 'MEDIUM':
      return chalk.yellow;
    case 'LOW':
      return chalk.gray;
  }
}

export function printBanner(targetHandle: string): void {
  header(`📈 POSTSIGNAL - @${targetHandle}`, chalk.cyan);
}

export function logDemoMode(): void {
  console.log(chalk.yellow('\n  ⚠️  No posts file given, analysing the bundled demo dataset'));
}

export function logPatterns(context: PatternContext): void {
  header('📊 POSTING PATTERNS', chalk.blue);

  const { postingFrequency, activity, content } = context;
  console.log(`  Posts analysed: ${context.totalPosts}`);
  console.log(
    `  Windows: ${postingFrequency.windowCount} (mean ${postingFrequency.meanPerWindow} posts/window)`,
  );
  if (postingFrequency.intervals) {
    console.log(
      `  Hours between posts: mean ${postingFrequency.intervals.mean}, median ${postingFrequency.intervals.median}`,
    );
  }
  console.log(`  Posts per day: ${activity.averagePostsPerDay}`);
  if (activity.mostActiveHour !== null) {
    console.log(`  Most active hour: ${formatHours([activity.mostActiveHour])} UTC`);
  }
  if (activity.mostActiveDay !== null) {
    console.log(`  Most active day: ${DAY_NAMES[activity.mostActiveDay]}`);
  }

  console.log(chalk.white.bold('\n  Bursts:'));
  if (context.burstWindows.length === 0) {
    console.log(chalk.dim('    none detected'));
  }
  for (const burst of context.burstWindows) {
    console.log(`    ${burst.start.toISOString()} → ${burst.end.toISOString()} (${burst.postCount} posts)`);
  }

  console.log(chalk.white.bold('\n  Engagement:'));
  console.log(`    High-engagement hours (UTC): ${formatHours(context.highEngagementHours)}`);
  console.log(`    Threshold: ${context.timing.engagementThreshold}`);

  console.log(chalk.white.bold('\n  Sentiment:'));
  console.log(`    Average polarity: ${content.averagePolarity}`);
  console.log(`    Volatility: ${content.sentimentVolatility}`);
  console.log(`    Shifts: ${context.sentimentShifts.length}`);

  if (context.contentThemes.length > 0) {
    console.log(chalk.white.bold('\n  Themes:'));
    console.log(`    ${context.contentThemes.map(t => `${t.theme} (${t.count})`).join(', ')}`);
  }
}

export function logSignal(signal: Signal, rank: number): void {
  const color = typeColor(signal.type);
  console.log(
    `\n  ${rank}. ${color.bold(signal.type)} ${urgencyColor(signal.urgency)(`[${signal.urgency}]`)} ${chalk.white(signal.action)}`,
  );
  console.log(
    chalk.dim(
      `     confidence ${(signal.confidence * 100).toFixed(1)}% · polarity ${signal.polarity} · engagement ${signal.engagementScore}`,
    ),
  );
  console.log(chalk.dim(`     post ${signal.postId} at ${signal.timestamp.toISOString()}`));
  if (signal.contextFlags.length > 0) {
    console.log(chalk.cyan(`     ${signal.contextFlags.join(', ')}`));
  }
}

export function logSignals(result: AnalysisResult): void {
  header('🎯 SIGNALS', chalk.magenta);
  console.log(chalk.dim(`  ${result.candidateCount} candidates, ${result.signals.length} above threshold`));

  if (result.signals.length === 0) {
    console.log(chalk.gray('  No signals above the confidence threshold'));
    return;
  }
  result.signals.forEach((signal, i) => logSignal(signal, i + 1));
}

export function logError(error: Error): void {
  console.error(chalk.red(`\n  ❌ ${error.name}: ${error.message}`));
}

export function printReport(result: AnalysisResult): void {
  logPatterns(result.context);
  logSignals(result);
}
