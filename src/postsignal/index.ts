/**
 * postsignal - Pattern Analysis & Signal Generation Engine
 *
 * Main entry point that coordinates all modules:
 * - Post store (filtering, ordering, loading)
 * - Sentiment & keyword scoring
 * - Pattern detection
 * - Signal generation
 * - Ranking
 */

// Re-export core types
export * from './types.js';
export * from './errors.js';
export {
  AnalysisConfigSchema,
  DEFAULT_CRYPTO_KEYWORDS,
  DEFAULT_STOCK_KEYWORDS,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  parseConfig,
  validateConfig,
} from './config.js';
export type { AnalysisConfig, AnalysisConfigInput, ConfidenceWeights, PatternConfig } from './config.js';

export { engagementScore, isOriginalPost, selectOriginalPosts } from './posts/store.js';
export { parsePosts, loadPostsFile, loadDemoPosts } from './posts/loader.js';

export { analyzeSentiment } from './scoring/sentiment.js';
export { matchKeywords } from './scoring/keywords.js';
export { createLexicon, getDefaultLexicon } from './scoring/lexicon.js';
export type { Lexicon } from './scoring/lexicon.js';
export { PostScorer, createPostScorer } from './scoring/scorer.js';

export { PatternDetector, createPatternDetector } from './patterns/detector.js';
export { rollingSentiment, sentimentShifts } from './patterns/trend.js';
export { contentTokens } from './patterns/themes.js';

export { SignalGenerator, createSignalGenerator } from './signals/generator.js';
export {
  SignalRanker,
  createSignalRanker,
  urgencyFor,
  compareSignals,
  DEFAULT_CONFIDENCE_WEIGHTS,
} from './signals/ranker.js';

// Import for orchestrator
import type { AnalysisResult, Post, Signal } from './types.js';
import type { AnalysisConfig, AnalysisConfigInput } from './config.js';
import { parseConfig } from './config.js';
import { selectOriginalPosts } from './posts/store.js';
import { PostScorer } from './scoring/scorer.js';
import { PatternDetector } from './patterns/detector.js';
import { SignalGenerator } from './signals/generator.js';
import { SignalRanker } from './signals/ranker.js';
import { logger } from '../logger.js';

export type PipelinePhase = 'select' | 'score' | 'detect' | 'generate' | 'rank' | 'done';

/** Pipeline event types */
export type PipelineEvent =
  | { type: 'phase_change'; phase: PipelinePhase; message: string }
  | { type: 'signal'; signal: Signal };

export type PipelineEventHandler = (event: PipelineEvent) => void;

/**
 * Signal pipeline
 *
 * One run is a single synchronous pass:
 * 1. Keep original posts, ordered, most recent `limit`
 * 2. Score every post
 * 3. Detect patterns (barrier: needs the whole history)
 * 4. Generate candidates against the frozen context
 * 5. Rank, filter and order
 */
export class SignalPipeline {
  readonly config: AnalysisConfig;

  private readonly scorer: PostScorer;
  private readonly detector: PatternDetector;
  private readonly generator: SignalGenerator;
  private eventHandlers: PipelineEventHandler[] = [];

  /**
   * @throws ConfigurationError before any analysis when the config is invalid
   */
  constructor(config: AnalysisConfigInput = {}) {
    this.config = parseConfig(config);
    this.scorer = new PostScorer(this.config);
    this.detector = new PatternDetector(this.config, this.scorer);
    this.generator = new SignalGenerator(this.config);
  }

  /**
   * Subscribe to pipeline events
   */
  onEvent(handler: PipelineEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter(h => h !== handler);
    };
  }

  private emit(event: PipelineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        logger.error('PIPELINE', 'Event Handler', e instanceof Error ? e : String(e));
      }
    }
  }

  private setPhase(phase: PipelinePhase, message: string): void {
    this.emit({ type: 'phase_change', phase, message });
  }

  run(posts: readonly Post[]): AnalysisResult {
    const { targetHandle, limit, minConfidence, confidence } = this.config;

    this.setPhase('select', `Selecting original posts from ${posts.length} received`);
    const selected = selectOriginalPosts(posts, limit);

    this.setPhase('score', `Scoring ${selected.length} posts`);
    const scores = this.scorer.scoreAll(selected);

    this.setPhase('detect', 'Detecting posting patterns');
    const context = this.detector.detect(selected, scores);

    this.setPhase('generate', 'Generating signal candidates');
    const candidates = this.generator.generateAll(selected, scores, context);

    this.setPhase('rank', `Ranking ${candidates.length} candidates`);
    const ranker = new SignalRanker(confidence, context.engagementCeiling);
    const signals = ranker.enhance(candidates, minConfidence);

    for (const signal of signals) {
      this.emit({ type: 'signal', signal });
    }

    logger.runCompleted({ targetHandle, posts: selected.length, signals: signals.length });
    this.setPhase('done', `${signals.length} signals for @${targetHandle}`);

    return {
      targetHandle,
      postsAnalyzed: selected.length,
      context,
      candidateCount: candidates.length,
      signals,
    };
  }
}

export function createSignalPipeline(config?: AnalysisConfigInput): SignalPipeline {
  return new SignalPipeline(config);
}

/**
 * One-shot analysis with a fresh pipeline
 */
export function analyzePosts(posts: readonly Post[], config?: AnalysisConfigInput): AnalysisResult {
  return createSignalPipeline(config).run(posts);
}
