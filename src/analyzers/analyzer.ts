import type { StorageBackend } from '../storage/storage.backend';
import type { ComponentType, InstanceContext, JsonValue } from '../types';

/** What every analyzer receives, regardless of how it is invoked. */
export interface AnalyzerInput {
  reviewId: string;
  daysBack: number;
  instanceContext: InstanceContext;
}

/**
 * The only thing an invocation reports back. The analysis itself travels
 * through storage, so the orchestrator never sees payload shapes.
 */
export type AnalyzerSignal = { success: true } | { success: false; error: string };

export type AnalyzerHandler = (input: AnalyzerInput) => Promise<AnalyzerSignal>;

export type AnalyzeFn = (input: AnalyzerInput) => Promise<JsonValue>;

/**
 * Wraps an analysis body with the persistence half of the contract: store the
 * result under (reviewId, componentType), then signal. A failed write is
 * reported as a failed analyzer.
 */
export function createAnalyzerHandler(
  componentType: ComponentType,
  storage: StorageBackend,
  analyze: AnalyzeFn
): AnalyzerHandler {
  return async (input) => {
    let result: JsonValue;
    try {
      result = await analyze(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Analyzer ${componentType} failed for review ${input.reviewId}:`, message);
      return { success: false, error: message };
    }

    const stored = await storage.put(input.reviewId, componentType, result);
    if (!stored.success) {
      return { success: false, error: `Failed to store ${componentType} result: ${stored.error.message}` };
    }

    return { success: true };
  };
}
