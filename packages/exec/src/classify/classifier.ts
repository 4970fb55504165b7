import * as path from 'path';
import type { Vocabulary } from '@kiln/shared';
import type { LineSeverity, OutputClassifier } from './types';

/**
 * Markers used by rustc/cargo and most compilers that follow the same diagnostic style.
 */
export const DEFAULT_VOCABULARY: Vocabulary = {
  error: ['error:', 'error['],
  warning: ['warning:', 'warning['],
};

/**
 * Case-insensitive substring classifier. A line counts at most once; error markers win.
 */
export class VocabularyClassifier implements OutputClassifier {
  private readonly errorMarkers: string[];
  private readonly warningMarkers: string[];

  constructor(vocabulary: Vocabulary = DEFAULT_VOCABULARY) {
    this.errorMarkers = vocabulary.error.map((m) => m.toLowerCase());
    this.warningMarkers = vocabulary.warning.map((m) => m.toLowerCase());
  }

  classify(line: string): LineSeverity {
    const lower = line.toLowerCase();
    if (this.errorMarkers.some((marker) => lower.includes(marker))) return 'error';
    if (this.warningMarkers.some((marker) => lower.includes(marker))) return 'warning';
    return 'info';
  }
}

export function normalizeBin(bin: string): string {
  if (!bin) return '';
  const base = path.basename(bin.replace(/\\/g, '/'));
  return base.toLowerCase().replace(/\.(exe|cmd|bat)$/i, '');
}

/**
 * Picks a classifier per program, falling back to the default vocabulary.
 */
export class ClassifierRegistry {
  private readonly byProgram = new Map<string, OutputClassifier>();

  constructor(private readonly fallback: OutputClassifier = new VocabularyClassifier()) {}

  static fromVocabularies(vocabularies: Record<string, Vocabulary>): ClassifierRegistry {
    const registry = new ClassifierRegistry();
    for (const [program, vocabulary] of Object.entries(vocabularies)) {
      registry.register(program, new VocabularyClassifier(vocabulary));
    }
    return registry;
  }

  register(program: string, classifier: OutputClassifier): this {
    this.byProgram.set(normalizeBin(program), classifier);
    return this;
  }

  for(program: string): OutputClassifier {
    return this.byProgram.get(normalizeBin(program)) ?? this.fallback;
  }
}
