import {
  GenerationAbortedError,
  GenerationProviderError,
  GenerationUnavailableError,
  OperationTimeoutError,
} from '../../../common/errors/rag.errors';
import * as asyncUtil from '../../../common/utils/async.util';
import { GenerationSettings } from '../../../config/rag.config';
import { ragSettings } from '../../../../test/fakes/settings';
import { GenerationStep, hangUntilAborted, ScriptedGenerationProvider } from '../../../../test/fakes/scripted-generation.provider';
import { GenerationService } from '../services/generation.service';

const unavailable = () => new GenerationProviderError('service unavailable', true, 503);
const badRequest = () => new GenerationProviderError('invalid request', false, 400);

function setup(steps: GenerationStep[], generation: Partial<GenerationSettings> = {}) {
  const provider = new ScriptedGenerationProvider(steps);
  const settings = ragSettings();
  const service = new GenerationService(provider, {
    ...settings,
    generation: { ...settings.generation, ...generation },
  });
  return { provider, service };
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('GenerationService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the first successful completion', async () => {
    const { provider, service } = setup(['Savings accounts earn 5%.']);

    await expect(service.generate('prompt')).resolves.toEqual({
      text: 'Savings accounts earn 5%.',
      attempts: 1,
      model: 'scripted-model',
    });
    expect(provider.prompts).toEqual(['prompt']);
  });

  it('retries transient failures', async () => {
    const { provider, service } = setup([unavailable(), unavailable(), 'Recovered.']);

    await expect(service.generate('prompt')).resolves.toMatchObject({ text: 'Recovered.', attempts: 3 });
    expect(provider.calls).toBe(3);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    const { provider, service } = setup([unavailable()]);

    const error = await failure(service.generate('prompt'));

    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ reason: 'retries_exhausted', attempts: 3 });
    expect(provider.calls).toBe(3);
  });

  it('does not retry non-transient failures', async () => {
    const { provider, service } = setup([badRequest(), 'never reached']);

    const error = await failure(service.generate('prompt'));

    expect(error).toMatchObject({ reason: 'non_transient', attempts: 1 });
    expect(provider.calls).toBe(1);
  });

  it('treats unclassified errors as non-transient', async () => {
    const { provider, service } = setup([new Error('boom')]);

    const error = await failure(service.generate('prompt'));

    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ reason: 'non_transient' });
    expect(provider.calls).toBe(1);
  });

  it('times out a hanging attempt and retries', async () => {
    let aborted: AbortSignal | undefined;
    const { provider, service } = setup(
      [
        (prompt, signal) => {
          aborted = signal;
          return hangUntilAborted(prompt, signal);
        },
        'Second try.',
      ],
      { timeoutMs: 20 },
    );

    await expect(service.generate('prompt')).resolves.toMatchObject({ text: 'Second try.', attempts: 2 });
    expect(provider.calls).toBe(2);
    expect(aborted?.aborted).toBe(true);
  });

  it('reports timeouts as the last error once retries run out', async () => {
    const { service } = setup([hangUntilAborted], { timeoutMs: 10, maxRetries: 1 });

    const error = await failure(service.generate('prompt'));

    expect(error).toMatchObject({ reason: 'retries_exhausted', attempts: 2 });
    expect(error instanceof GenerationUnavailableError && error.lastError).toBeInstanceOf(OperationTimeoutError);
  });

  it('stops when the caller aborts an attempt', async () => {
    const controller = new AbortController();
    const { provider, service } = setup([
      (prompt, signal) => {
        setTimeout(() => controller.abort(), 5);
        return hangUntilAborted(prompt, signal);
      },
    ]);

    const error = await failure(service.generate('prompt', { signal: controller.signal, timeoutMs: 10_000 }));

    expect(error).toBeInstanceOf(GenerationAbortedError);
    expect(error).toMatchObject({ attempts: 1 });
    expect(provider.calls).toBe(1);
  });

  it('stops when the caller aborts during backoff', async () => {
    const controller = new AbortController();
    const { provider, service } = setup([unavailable()], { retryDelayMs: 10_000 });

    const pending = service.generate('prompt', { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toThrow(GenerationAbortedError);
    expect(provider.calls).toBe(1);
  });

  it('does not call the provider when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { provider, service } = setup(['unused']);

    await expect(service.generate('prompt', { signal: controller.signal })).rejects.toThrow(GenerationAbortedError);
    expect(provider.calls).toBe(0);
  });

  it('doubles the backoff between attempts', async () => {
    const sleep = jest.spyOn(asyncUtil, 'sleep').mockResolvedValue(undefined);
    const { service } = setup([unavailable()], { retryDelayMs: 100, maxRetries: 3 });

    await expect(service.generate('prompt')).rejects.toThrow(GenerationUnavailableError);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
  });
});
