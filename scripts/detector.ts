/**
 * Heuristic filter that separates Neovim configs from other Lua files
 * (window manager, game engine and terminal configs share the filename)
 */

import { DataLoader } from './config.js';
import { DetectionPatterns } from './validation.js';

export interface DetectionResult {
  isNeovim: boolean;
  confidence: number;
  positive: string[];
  negative: string[];
  reason: 'empty' | 'negative-only' | 'score';
}

export const DEFAULT_DETECTION_THRESHOLD = 0.5;

let defaultPatterns: DetectionPatterns | null = null;

function loadDefaultPatterns(): DetectionPatterns {
  if (!defaultPatterns) {
    defaultPatterns = new DataLoader().loadDetectionPatterns();
  }
  return defaultPatterns;
}

/**
 * Score a Lua file. Three positive signals give full confidence; each
 * negative one costs 0.3 (capped at 0.9), scaled down to 30% when the file
 * uses the vim.* API.
 */
export function detectNeovimConfig(
  text: string,
  threshold: number = DEFAULT_DETECTION_THRESHOLD,
  patterns: DetectionPatterns = loadDefaultPatterns()
): DetectionResult {
  if (!text.trim()) {
    return { isNeovim: false, confidence: 0, positive: [], negative: [], reason: 'empty' };
  }

  const positive = patterns.positive.filter(pattern => pattern.test(text)).map(pattern => pattern.source);
  const negative = patterns.negative.filter(pattern => pattern.test(text)).map(pattern => pattern.source);

  if (negative.length > 0 && positive.length === 0) {
    return { isNeovim: false, confidence: 0, positive, negative, reason: 'negative-only' };
  }

  const positiveScore = Math.min(positive.length / 3, 1);
  let negativePenalty = Math.min(negative.length * 0.3, 0.9);

  if (positive.some(source => source.includes('vim\\.'))) {
    negativePenalty *= 0.3;
  }

  let confidence = Math.max(0, positiveScore - negativePenalty);

  if (positive.length === 0 && /^return\s+\{/m.test(text)) {
    confidence = 0.1;
  }

  if (positive.length === 0 && text.trim().length < 50) {
    confidence = 0;
  }

  return {
    isNeovim: confidence >= threshold,
    confidence,
    positive,
    negative,
    reason: 'score'
  };
}

/**
 * Bind a detector to a threshold and pattern set
 */
export function createDetector(
  threshold: number = DEFAULT_DETECTION_THRESHOLD,
  patterns?: DetectionPatterns
): (text: string) => DetectionResult {
  const resolved = patterns ?? loadDefaultPatterns();
  return text => detectNeovimConfig(text, threshold, resolved);
}
