import {
  type AnswerClient,
  type AnswerClientOptions,
  type AnswerResult,
  type GenerationOptions,
  GenerateResponseSchema,
  GenerationOptionsSchema,
  type RetryPolicy,
  RetryPolicySchema,
  TagsResponseSchema,
} from './types';

export const ASK_TIMEOUT_MS = 30_000;
export const STATUS_TIMEOUT_MS = 5_000;
export const LIST_MODELS_TIMEOUT_MS = 10_000;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

const joinUrl = (base: string, path: string) => {
  if (!base.endsWith('/') && !path.startsWith('/')) return `${base}/${path}`;
  if (base.endsWith('/') && path.startsWith('/')) return `${base}${path.slice(1)}`;
  return `${base}${path}`;
};

const failure = (message: string): AnswerResult => ({ ok: false, error: new Error(message) });

const parseGenerateResponse = async (response: Response): Promise<AnswerResult> => {
  if (!response.ok) {
    return failure(`Answer request failed: ${response.status}`);
  }
  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
  const parsed = GenerateResponseSchema.safeParse(payload);
  if (parsed.success) {
    if (parsed.data.response !== undefined) return { ok: true, answer: parsed.data.response };
    if (parsed.data.error !== undefined) return failure(parsed.data.error);
  }
  return failure('Unexpected generate schema');
};

export const createAnswerClient = (
  options: AnswerClientOptions,
  retryPolicy: RetryPolicy = RetryPolicySchema.parse({})
): AnswerClient => {
  const sleep = options.sleep ?? delay;
  const generateUrl = joinUrl(options.baseUrl, '/api/generate');
  const tagsUrl = joinUrl(options.baseUrl, '/api/tags');
  let model = options.model;
  let generation: GenerationOptions = GenerationOptionsSchema.parse(options.generation ?? {});

  const buildRequest = (prompt: string, stream: boolean, signal?: AbortSignal): RequestInit => ({
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      model,
      prompt,
      stream,
      options: {
        temperature: generation.temperature,
        top_p: generation.topP,
        num_predict: generation.maxTokens,
      },
    }),
    signal,
  });

  const ask = async (question: string): Promise<AnswerResult> => {
    let attempt = 0;
    let lastError: Error | undefined;

    while (attempt < retryPolicy.maxAttempts) {
      let response: Response;
      try {
        response = await options.fetcher(
          generateUrl,
          buildRequest(question, false, AbortSignal.timeout(ASK_TIMEOUT_MS))
        );
      } catch (error) {
        lastError = toError(error);
        attempt += 1;
        if (attempt >= retryPolicy.maxAttempts) break;
        await sleep(retryPolicy.baseDelayMs * attempt);
        continue;
      }
      return parseGenerateResponse(response);
    }

    return { ok: false, error: lastError ?? new Error('Answer request failed') };
  };

  const askStream: AnswerClient['askStream'] = (question, onToken, onError, onComplete) => {
    const controller = new AbortController();
    let finished = false;

    const fail = (error: unknown) => {
      if (finished) return;
      finished = true;
      onError(toError(error));
    };

    const complete = () => {
      if (finished) return;
      finished = true;
      onComplete();
    };

    const handleLine = (line: string) => {
      if (!line || finished) return;
      let payload: unknown;
      try {
        payload = JSON.parse(line);
      } catch {
        // skip malformed stream lines
        return;
      }
      const parsed = GenerateResponseSchema.safeParse(payload);
      if (!parsed.success) return;
      if (parsed.data.done) {
        complete();
        return;
      }
      if (parsed.data.response !== undefined) onToken(parsed.data.response);
      if (parsed.data.error !== undefined) fail(new Error(parsed.data.error));
    };

    const run = async () => {
      const response = await options.fetcher(generateUrl, buildRequest(question, true, controller.signal));
      if (!response.ok) {
        throw new Error(`Answer request failed: ${response.status}`);
      }
      if (!response.body) {
        throw new Error('Answer stream has no body');
      }
      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let pending = '';
      while (!finished) {
        const { done, value } = await reader.read();
        if (done) break;
        pending += decoder.decode(value, { stream: true });
        let newline = pending.indexOf('\n');
        while (newline >= 0) {
          handleLine(pending.slice(0, newline).trim());
          pending = pending.slice(newline + 1);
          newline = pending.indexOf('\n');
        }
      }
      handleLine((pending + decoder.decode()).trim());
      complete();
      controller.abort();
    };

    run().catch((error: unknown) => {
      if (controller.signal.aborted) return;
      fail(error);
    });

    return {
      cancel: () => {
        finished = true;
        controller.abort();
      },
    };
  };

  const checkStatus = async () => {
    try {
      const response = await options.fetcher(tagsUrl, {
        signal: AbortSignal.timeout(STATUS_TIMEOUT_MS),
      });
      return response.status === 200;
    } catch {
      return false;
    }
  };

  const listModels = async () => {
    const response = await options.fetcher(tagsUrl, {
      signal: AbortSignal.timeout(LIST_MODELS_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`Model list request failed: ${response.status}`);
    }
    const parsed = TagsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Unexpected tags schema');
    }
    return parsed.data.models.map((entry) => entry.name);
  };

  return {
    ask,
    askStream,
    checkStatus,
    listModels,
    getModel: () => model,
    setModel: (next) => {
      model = next;
    },
    setGeneration: (next) => {
      generation = GenerationOptionsSchema.parse({ ...generation, ...next });
    },
  };
};
