import { InvokeCommand, type LambdaClient } from '@aws-sdk/client-lambda';
import type { AnalyzerHandler, AnalyzerInput, AnalyzerSignal } from '../analyzers/analyzer';
import type { ComponentType } from '../types';

/**
 * Turns "run analyzer X for this review" into a success/failure signal.
 * Whether that signal is a direct return or a polled status is up to the
 * implementation; implementations resolve rather than reject.
 */
export interface AnalyzerInvoker {
  invoke(componentType: ComponentType, input: AnalyzerInput): Promise<AnalyzerSignal>;
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** Runs analyzer handlers inside this process. */
export class LocalAnalyzerInvoker implements AnalyzerInvoker {
  private handlers: Partial<Record<ComponentType, AnalyzerHandler>>;

  constructor(handlers: Partial<Record<ComponentType, AnalyzerHandler>>) {
    this.handlers = handlers;
  }

  async invoke(componentType: ComponentType, input: AnalyzerInput): Promise<AnalyzerSignal> {
    const handler = this.handlers[componentType];
    if (!handler) {
      return { success: false, error: `No handler registered for ${componentType}` };
    }

    try {
      return await handler(input);
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}

/**
 * Synchronous (RequestResponse) Lambda invocation, one function per analyzer.
 * A non-200 status, a FunctionError, or an `error` key in the returned payload
 * all count as failure.
 */
export class LambdaAnalyzerInvoker implements AnalyzerInvoker {
  private client: LambdaClient;
  private functions: Partial<Record<ComponentType, string>>;

  constructor(client: LambdaClient, functions: Partial<Record<ComponentType, string>>) {
    this.client = client;
    this.functions = functions;
  }

  async invoke(componentType: ComponentType, input: AnalyzerInput): Promise<AnalyzerSignal> {
    const functionName = this.functions[componentType];
    if (!functionName) {
      return { success: false, error: `No function configured for ${componentType}` };
    }

    try {
      console.log(`Invoking analyzer: ${functionName}`);

      const response = await this.client.send(
        new InvokeCommand({
          FunctionName: functionName,
          InvocationType: 'RequestResponse',
          Payload: Buffer.from(JSON.stringify(input)),
        })
      );

      const raw = response.Payload ? Buffer.from(response.Payload).toString('utf-8') : '';

      if (response.StatusCode !== 200 || response.FunctionError) {
        return {
          success: false,
          error: `${functionName} returned ${response.FunctionError ?? `status ${response.StatusCode}`}: ${raw}`,
        };
      }

      const error = extractError(raw);
      if (error) {
        return { success: false, error };
      }

      console.log(`Successfully invoked ${functionName}`);
      return { success: true };
    } catch (error) {
      console.error(`Exception invoking ${functionName}:`, describeError(error));
      return { success: false, error: describeError(error) };
    }
  }
}

function extractError(raw: string): string | null {
  if (!raw) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return `Unreadable response payload: ${raw.slice(0, 200)}`;
  }

  if (parsed && typeof parsed === 'object' && 'error' in parsed && parsed.error) {
    return typeof parsed.error === 'string' ? parsed.error : JSON.stringify(parsed.error);
  }
  return null;
}
