import {
  ClassificationResult, ClassificationSignals, ExclusionRules, KeywordCategory,
  KeywordHit, KeywordSnapshot, Message, ScoringWeights, SentimentReading
} from '../../types/models';
import { adjustmentKey } from '../../models/transformers';
import { SentimentScorer } from '../sentiment/SentimentAdapter';
import { checkNegation } from './NegationChecker';
import { cleanText, findTermMatches, tokenize } from './Tokenizer';

export interface KeywordAnalysis {
  bodyHits: KeywordHit[];
  subjectHits: KeywordHit[];
  urgencyHits: KeywordHit[];
  negatedHits: KeywordHit[];
  keywordConfidence: number;
  hasBody: boolean;
  hasSubject: boolean;
}

type SignalCategory = Exclude<KeywordCategory, 'negation'>;

const debugLog = (...args: unknown[]) => {
  if (process.env.COMPLAINT_DEBUG === 'true') {
    console.log(...args);
  }
};

/**
 * Combines keyword, urgency, negation and sentiment signals into a single
 * complaint confidence. A message is a complaint iff its confidence
 * reaches the keyword threshold.
 */
export class ScoringEngine {
  constructor(
    private weights: ScoringWeights,
    private exclusions: ExclusionRules,
    private sentiment: SentimentScorer
  ) {}

  async classify(
    message: Message,
    snapshot: KeywordSnapshot,
    signal?: AbortSignal
  ): Promise<ClassificationResult> {
    const excludedBy = this.matchExclusion(message);
    if (excludedBy) {
      console.log(`⏭️ Excluded by ${excludedBy} rule: ${excludedBy === 'from' ? message.sender : message.subject}`);
      return this.result(message, 0, excludedBy, emptySignals(this.weights));
    }

    const analysis = this.analyzeKeywords(message.subject, message.body, snapshot);
    const keywordConfidence = analysis.keywordConfidence;
    const threshold = this.weights.keywordThreshold;
    const band = this.weights.sentimentBand;

    let confidence = keywordConfidence;
    let reading: SentimentReading | undefined;

    if (!analysis.hasBody && !analysis.hasSubject) {
      debugLog(`[SCORING] ${message.id} has no text to score`);
    } else if (this.weights.sentimentMode === 'additive') {
      reading = await this.sentiment.score(sentimentText(message, analysis), signal);
      if (!reading.fallback && reading.score >= this.weights.sentimentThreshold) {
        confidence = keywordConfidence + this.weights.sentiment * reading.score;
      }
    } else if (this.weights.sentimentMode === 'gate') {
      if (!analysis.hasBody) {
        // Subject only: sentiment decides on its own
        reading = await this.sentiment.score(cleanText(message.subject), signal);
        if (!reading.fallback) {
          confidence = this.confirms(reading)
            ? Math.max(keywordConfidence, threshold)
            : Math.min(keywordConfidence, threshold - band);
        }
      } else if (keywordConfidence >= threshold - band && keywordConfidence < threshold + band) {
        reading = await this.sentiment.score(sentimentText(message, analysis), signal);
        if (!reading.fallback) {
          confidence = this.confirms(reading) ? Math.max(keywordConfidence, threshold) : threshold - band;
        }
      }
    }

    const signals: ClassificationSignals = {
      bodyHits: analysis.bodyHits,
      subjectHits: analysis.subjectHits,
      urgencyHits: analysis.urgencyHits,
      negatedHits: analysis.negatedHits,
      keywordConfidence,
      sentiment: reading,
      sentimentContribution: confidence - keywordConfidence,
      rule: this.weights.sentimentMode
    };

    debugLog(`[SCORING] ${message.id}: keywords=${keywordConfidence.toFixed(3)} final=${confidence.toFixed(3)} sentiment=${reading ? reading.score.toFixed(3) : 'n/a'}`);

    return this.result(message, confidence, null, signals);
  }

  /**
   * Keyword-only part of the score. Also used by the feedback loop to see
   * which terms a missed message would have matched.
   */
  analyzeKeywords(subject: string, body: string, snapshot: KeywordSnapshot): KeywordAnalysis {
    const { keywords, adjustments } = snapshot;
    const { contextualCheck } = this.weights;
    const bodyTokens = tokenize(body);
    const subjectTokens = tokenize(subject);

    const hit = (category: SignalCategory, term: string, index: number, factor: number): KeywordHit => ({
      term,
      category,
      index,
      factor,
      multiplier: adjustments.get(adjustmentKey(category, term)) ?? 1
    });

    const negators: ReadonlySet<string> = contextualCheck.negativeWords.length > 0
      ? new Set([...keywords.negation, ...contextualCheck.negativeWords])
      : keywords.negation;

    const bodyHits: KeywordHit[] = [];
    const negatedHits: KeywordHit[] = [];
    for (const match of findTermMatches(bodyTokens, keywords.complaint)) {
      const factor = contextualCheck.enabled
        ? checkNegation(bodyTokens, match.index, contextualCheck.proximity, negators, match.length)
        : 1;

      if (factor < contextualCheck.scoreThreshold) {
        negatedHits.push(hit('complaint', match.term, match.index, factor));
      } else {
        bodyHits.push(hit('complaint', match.term, match.index, factor));
      }
    }

    const subjectHits = findTermMatches(subjectTokens, keywords.subject)
      .map(match => hit('subject', match.term, match.index, 1));

    // Urgency is never dampened by negation
    const urgencyHits = [
      ...findTermMatches(bodyTokens, keywords.urgency),
      ...findTermMatches(subjectTokens, keywords.urgency)
    ].map(match => hit('urgency', match.term, match.index, 1));

    const keywordConfidence =
      this.weights.bodyKeyword * this.saturate(weightedSum(bodyHits)) +
      this.weights.subjectKeyword * this.saturate(weightedSum(subjectHits)) +
      this.weights.urgency * this.saturate(weightedSum(urgencyHits)) +
      this.weights.negation * negatedHits.length;

    return {
      bodyHits,
      subjectHits,
      urgencyHits,
      negatedHits,
      keywordConfidence,
      hasBody: bodyTokens.length > 0,
      hasSubject: subjectTokens.length > 0
    };
  }

  matchExclusion(message: Pick<Message, 'sender' | 'subject'>): 'from' | 'subject' | null {
    if (this.exclusions.from.some(pattern => pattern.test(message.sender))) return 'from';
    if (this.exclusions.subject.some(pattern => pattern.test(message.subject))) return 'subject';
    return null;
  }

  private confirms(reading: SentimentReading): boolean {
    return reading.score >= this.weights.sentimentThreshold;
  }

  private saturate(total: number): number {
    const saturation = this.weights.keywordSaturation;
    return Math.min(Math.max(total, 0), saturation) / saturation;
  }

  private result(
    message: Message,
    confidence: number,
    excludedBy: 'from' | 'subject' | null,
    signals: ClassificationSignals
  ): ClassificationResult {
    return {
      messageId: message.id,
      mailboxId: message.mailboxId,
      confidence,
      isComplaint: excludedBy === null && confidence >= this.weights.keywordThreshold,
      excludedBy,
      signals,
      classifiedAt: new Date()
    };
  }
}

function weightedSum(hits: KeywordHit[]): number {
  return hits.reduce((total, hit) => total + hit.factor * hit.multiplier, 0);
}

function sentimentText(message: Message, analysis: KeywordAnalysis): string {
  return analysis.hasBody ? cleanText(message.body) : cleanText(message.subject);
}

function emptySignals(weights: ScoringWeights): ClassificationSignals {
  return {
    bodyHits: [],
    subjectHits: [],
    urgencyHits: [],
    negatedHits: [],
    keywordConfidence: 0,
    sentimentContribution: 0,
    rule: weights.sentimentMode
  };
}
