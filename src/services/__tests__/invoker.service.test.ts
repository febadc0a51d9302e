import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import { mockClient } from 'aws-sdk-client-mock';
import { createAnalyzerHandler, type AnalyzerInput } from '../../analyzers/analyzer';
import { MemoryStorageBackend } from '../../test-utils/memory-storage';
import { silenceConsole } from '../../test-utils/results';
import { parseConnectInstanceArn } from '../../utils/instance-arn';
import { LambdaAnalyzerInvoker, LocalAnalyzerInvoker } from '../invoker.service';

const lambdaMock = mockClient(LambdaClient);

const input: AnalyzerInput = {
  reviewId: 'R1',
  daysBack: 7,
  instanceContext: parseConnectInstanceArn('arn:aws:connect:us-east-1:123456789012:instance/test-instance'),
};

const payload = (body: unknown) => Buffer.from(JSON.stringify(body));

describe('LambdaAnalyzerInvoker', () => {
  let invoker: LambdaAnalyzerInvoker;

  beforeEach(() => {
    silenceConsole();
    lambdaMock.reset();
    invoker = new LambdaAnalyzerInvoker(new LambdaClient({ region: 'us-east-1' }), {
      quota: 'quota-analyzer',
      metrics: 'metrics-analyzer',
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('invokes the configured function synchronously with the analyzer input', async () => {
    lambdaMock.on(InvokeCommand).callsFake(() => ({ StatusCode: 200, Payload: payload({ statusCode: 200 }) }));

    await expect(invoker.invoke('quota', input)).resolves.toEqual({ success: true });

    const [call] = lambdaMock.commandCalls(InvokeCommand);
    expect(call.args[0].input).toEqual({
      FunctionName: 'quota-analyzer',
      InvocationType: 'RequestResponse',
      Payload: payload(input),
    });
  });

  it('treats an error key in the response payload as failure', async () => {
    lambdaMock
      .on(InvokeCommand)
      .callsFake(() => ({ StatusCode: 200, Payload: payload({ error: 'quota lookup failed' }) }));

    await expect(invoker.invoke('quota', input)).resolves.toEqual({ success: false, error: 'quota lookup failed' });
  });

  it('treats a function error as failure', async () => {
    lambdaMock.on(InvokeCommand).callsFake(() => ({
      StatusCode: 200,
      FunctionError: 'Unhandled',
      Payload: payload({ errorMessage: 'Task timed out' }),
    }));

    await expect(invoker.invoke('metrics', input)).resolves.toEqual({
      success: false,
      error: 'metrics-analyzer returned Unhandled: {"errorMessage":"Task timed out"}',
    });
  });

  it('treats a non-200 status as failure', async () => {
    lambdaMock.on(InvokeCommand).callsFake(() => ({ StatusCode: 500 }));

    await expect(invoker.invoke('quota', input)).resolves.toEqual({
      success: false,
      error: 'quota-analyzer returned status 500: ',
    });
  });

  it('resolves with a failure when the call itself rejects', async () => {
    lambdaMock.on(InvokeCommand).rejects(new Error('connect ECONNREFUSED'));

    await expect(invoker.invoke('quota', input)).resolves.toEqual({ success: false, error: 'connect ECONNREFUSED' });
  });

  it('fails without calling out when no function is configured', async () => {
    await expect(invoker.invoke('logs', input)).resolves.toEqual({
      success: false,
      error: 'No function configured for logs',
    });
    expect(lambdaMock.commandCalls(InvokeCommand)).toHaveLength(0);
  });
});

describe('LocalAnalyzerInvoker', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('runs the handler and stores its result', async () => {
    const storage = new MemoryStorageBackend();
    const invoker = new LocalAnalyzerInvoker({
      flow: createAnalyzerHandler('flow', storage, async ({ daysBack }) => ({ flows: 3, daysBack })),
    });

    await expect(invoker.invoke('flow', input)).resolves.toEqual({ success: true });
    expect(storage.records.get('R1/flow')?.payload).toEqual({ flows: 3, daysBack: 7 });
  });

  it('turns a handler that throws into a failure', async () => {
    const invoker = new LocalAnalyzerInvoker({
      phone: async () => {
        throw new Error('handler crashed');
      },
    });

    await expect(invoker.invoke('phone', input)).resolves.toEqual({ success: false, error: 'handler crashed' });
  });

  it('reports a missing handler as a failure', async () => {
    const invoker = new LocalAnalyzerInvoker({});

    await expect(invoker.invoke('cloudtrail', input)).resolves.toEqual({
      success: false,
      error: 'No handler registered for cloudtrail',
    });
  });
});
