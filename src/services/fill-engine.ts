import type { EngineConfig } from '../config.js';
import { NoValueError } from '../errors.js';
import { ATTRIBUTE_NAMES, type AttributeName, type PersonalRecord } from '../schema/attributes.js';
import type {
  FillPreview,
  FillStats,
  FormField,
  MatchCandidate,
  MatchResult,
  PreviewEntry,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createAiMatcher, type AiMatcher } from './ai-matcher.js';
import { createPreview, createPreviewEntry, countPreview, type RenderOutcome } from './fill-preview.js';
import { normalizeLabel } from './label-normalizer.js';
import { resolveMatch } from './match-resolver.js';
import { NO_MATCH, RuleMatcher } from './rule-matcher.js';
import { renderValue, type FileExists } from './value-renderer.js';

export interface FillEngineDeps {
  ruleMatcher?: RuleMatcher;
  aiMatcher?: AiMatcher;
  fileExists?: FileExists;
}

export interface PreviewOptions {
  // Saved field id -> attribute choices for this site; a hit counts as a rule match at confidence 1
  siteMapping?: Readonly<Record<string, AttributeName>>;
}

export interface FieldMatch {
  result: MatchResult;
  aiConsulted: boolean;
}

export interface PreviewRun {
  preview: FillPreview;
  stats: FillStats;
}

/**
 * Runs the matching pipeline for one form at a time. Holds no per-run state,
 * so one engine can serve any number of forms.
 */
export class FillEngine {
  private readonly ruleMatcher: RuleMatcher;
  private readonly aiMatcher: AiMatcher;
  private readonly fileExists?: FileExists;

  constructor(
    private readonly config: EngineConfig,
    deps: FillEngineDeps = {}
  ) {
    this.ruleMatcher = deps.ruleMatcher ?? new RuleMatcher({ kindMismatchPenalty: config.kindMismatchPenalty });
    this.aiMatcher = deps.aiMatcher ?? createAiMatcher(config);
    this.fileExists = deps.fileExists;
  }

  get aiEnabled(): boolean {
    return this.aiMatcher.enabled;
  }

  async matchField(field: FormField, options: PreviewOptions = {}): Promise<FieldMatch> {
    const mapped = options.siteMapping?.[field.id];
    const rule: MatchCandidate = mapped
      ? { attribute: mapped, confidence: 1 }
      : this.ruleMatcher.match(normalizeLabel(field.label), field.kind);

    let ai: MatchCandidate = NO_MATCH;
    let aiConsulted = false;
    if (this.aiMatcher.enabled && rule.confidence < this.config.aiFallbackThreshold) {
      aiConsulted = true;
      ai = await this.aiMatcher.match({
        label: field.label,
        controlKind: field.kind,
        options: field.options,
        candidates: ATTRIBUTE_NAMES,
      });
    }

    return { result: resolveMatch(field.id, rule, ai, this.config.minAcceptConfidence), aiConsulted };
  }

  /**
   * Matches and renders every field in detection order. Per-field failures end
   * up in the preview; only the caller decides whether anything gets written.
   */
  async buildPreview(
    fields: readonly FormField[],
    record: PersonalRecord,
    options: PreviewOptions = {}
  ): Promise<PreviewRun> {
    const entries: PreviewEntry[] = [];
    let aiCalls = 0;

    for (const field of fields) {
      const { result, aiConsulted } = await this.matchField(field, options);
      if (aiConsulted) aiCalls++;

      let outcome: RenderOutcome | null = null;
      if (result.attribute !== 'unmatched') {
        outcome = this.render(field, result.attribute, record);
        logger.match(field.label, result.attribute, result.confidence, result.source);
      } else {
        logger.debug(`No match for "${field.label}"`);
      }

      entries.push(createPreviewEntry(field, result, outcome));
    }

    const preview = createPreview(entries);
    return {
      preview,
      stats: { detected: fields.length, ...countPreview(preview), aiCalls },
    };
  }

  private render(field: FormField, attribute: AttributeName, record: PersonalRecord): RenderOutcome {
    try {
      return { ok: true, value: renderValue(field, attribute, record, this.fileExists) };
    } catch (error) {
      if (error instanceof NoValueError) {
        logger.warn(`Field "${field.label}": ${error.message}`);
        return { ok: false, error };
      }
      throw error;
    }
  }
}
