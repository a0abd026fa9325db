import type { AnswerResult, AnswerService, AnswerStreamHandle } from '../answers/types';
import type { CommandOutputEvent } from '../command/types';
import type { ControllerState, InputInjector, PresentationLayer } from './types';

export const DEFAULT_INSERT_SETTLE_DELAY_MS = 450;
export const ANSWER_BACKEND_HINT = 'Make sure Ollama is running: ollama serve';

export type InsertOutcome = 'inserted' | 'clipboard';

export interface CommandControllerDependencies {
  answers: AnswerService;
  injector: InputInjector;
  clipboard: (text: string) => Promise<void>;
  presentation: PresentationLayer;
  insertSettleDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onError?: (error: unknown) => void;
}

export interface CommandController {
  handleEvent(event: CommandOutputEvent): Promise<void>;
  insert(text: string): Promise<InsertOutcome>;
  copy(text: string): Promise<void>;
  cancel(): void;
  close(): void;
  getState(): ControllerState;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

export const describeAnswerError = (error: Error) => `Error: ${error.message}\n\n${ANSWER_BACKEND_HINT}`;

export const createCommandController = (
  deps: CommandControllerDependencies
): CommandController => {
  const { presentation } = deps;
  const sleep = deps.sleep ?? delay;
  const settleDelayMs = deps.insertSettleDelayMs ?? DEFAULT_INSERT_SETTLE_DELAY_MS;

  let state: ControllerState = 'idle';
  let requestId = 0;
  let stream: AnswerStreamHandle | null = null;

  const report = (error: unknown) => {
    deps.onError?.(error);
  };

  // Bumping the request id drops late results from whatever was in flight.
  const supersede = () => {
    stream?.cancel();
    stream = null;
    requestId += 1;
    return requestId;
  };

  const answerDeferred = async (question: string) => {
    const id = supersede();
    state = 'answering';
    presentation.onDeferredFire(question);
    let result: AnswerResult;
    try {
      result = await deps.answers.ask(question);
    } catch (error) {
      result = { ok: false, error: toError(error) };
    }
    if (id !== requestId) return;
    if (result.ok) {
      state = 'ready';
      presentation.onAnswer(result.answer);
    } else {
      state = 'error';
      report(result.error);
      presentation.onAnswerError(describeAnswerError(result.error));
    }
  };

  const answerLive = (text: string) => {
    presentation.onLiveSubmit(text);
    const question = text.trim();
    if (!question) return;
    const id = supersede();
    state = 'streaming';
    let response = '';
    stream = deps.answers.askStream(
      question,
      (token) => {
        if (id !== requestId) return;
        response += token;
        presentation.onAnswerToken(response);
      },
      (error) => {
        if (id !== requestId) return;
        stream = null;
        state = 'error';
        report(error);
        presentation.onAnswerError(describeAnswerError(error));
      },
      () => {
        if (id !== requestId) return;
        stream = null;
        state = 'ready';
        presentation.onAnswer(response);
      }
    );
  };

  const startLive = async (deleteCount: number) => {
    supersede();
    state = 'idle';
    const deletion = deps.injector.deleteCharacters(deleteCount).catch(report);
    presentation.onLiveStart(deleteCount);
    await deletion;
  };

  const handleEvent = async (event: CommandOutputEvent) => {
    switch (event.type) {
      case 'previewUpdate':
        presentation.onPreviewUpdate(event.text, event.triggerLabel);
        return;
      case 'enterCommandMode':
        presentation.onEnterCommandMode(event.triggerLabel);
        return;
      case 'exitCommandMode':
        presentation.onExitCommandMode();
        return;
      case 'deferredTriggerFired':
        await answerDeferred(event.question);
        return;
      case 'liveModeStarted':
        await startLive(event.deleteCount);
        return;
      case 'liveBufferUpdated':
        presentation.onLiveUpdate(event.text);
        return;
      case 'liveSubmit':
        answerLive(event.text);
        return;
      case 'liveCancel':
        supersede();
        state = 'idle';
        presentation.onLiveCancel();
        return;
    }
  };

  const cancel = () => {
    supersede();
    state = 'idle';
  };

  const close = () => {
    cancel();
    presentation.onClose();
  };

  const insert = async (text: string): Promise<InsertOutcome> => {
    close();
    await sleep(settleDelayMs);
    try {
      await deps.injector.paste(text);
      return 'inserted';
    } catch (error) {
      report(error);
      await deps.clipboard(text);
      return 'clipboard';
    }
  };

  return {
    handleEvent,
    insert,
    copy: (text) => deps.clipboard(text),
    cancel,
    close,
    getState: () => state,
  };
};
