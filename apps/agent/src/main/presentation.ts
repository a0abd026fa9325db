import type { PresentationLayer, Settings } from '@keyprompt/core';

export type ResponseAction = Settings['responseAction'];

export interface PresentationLogger {
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
}

export interface PresentationActions {
  insert(text: string): Promise<unknown>;
  copy(text: string): Promise<void>;
  close(): void;
}

export interface ConsolePresentationOptions {
  logger: PresentationLogger;
  responseAction: ResponseAction;
  onError?: (error: unknown) => void;
}

export interface ConsolePresentation {
  presentation: PresentationLayer;
  bindActions(actions: PresentationActions): void;
  setResponseAction(action: ResponseAction): void;
  isVisible(): boolean;
}

export const createConsolePresentation = (
  options: ConsolePresentationOptions
): ConsolePresentation => {
  const { logger } = options;
  let responseAction = options.responseAction;
  let actions: PresentationActions | null = null;
  let hud = '';
  let visible = false;
  let answering = false;

  const report = (error: unknown) => {
    options.onError?.(error);
  };

  const showHud = (line: string) => {
    if (visible && line === hud) return;
    hud = line;
    visible = true;
    logger.info(`[hud] ${line}`);
  };

  const hideHud = () => {
    if (!visible) return;
    hud = '';
    visible = false;
    logger.info('[hud] hidden');
  };

  const deliver = (answer: string) => {
    if (!actions) return;
    if (responseAction === 'insert') {
      actions.insert(answer).catch(report);
      return;
    }
    if (responseAction === 'clipboard') {
      const { close } = actions;
      actions
        .copy(answer)
        .then(() => {
          logger.info('Answer copied to clipboard');
          close();
        })
        .catch(report);
    }
  };

  const presentation: PresentationLayer = {
    onPreviewUpdate(text, triggerLabel) {
      showHud(text ? `${triggerLabel} ${text}` : triggerLabel);
    },
    onEnterCommandMode(triggerLabel) {
      showHud(triggerLabel);
    },
    onExitCommandMode() {
      if (answering) return;
      hideHud();
    },
    onDeferredFire(question) {
      answering = true;
      showHud(`Thinking about: ${question}`);
    },
    onLiveStart() {
      showHud('Listening...');
    },
    onLiveUpdate(text) {
      showHud(`> ${text}`);
    },
    onLiveSubmit(text) {
      const question = text.trim();
      answering = Boolean(question);
      showHud(question ? `Thinking about: ${question}` : 'Nothing to ask');
    },
    onLiveCancel() {
      answering = false;
      hideHud();
    },
    onAnswerToken(partial) {
      showHud(partial);
    },
    onAnswer(answer) {
      answering = false;
      showHud(answer);
      deliver(answer);
    },
    onAnswerError(message) {
      answering = false;
      logger.warn(message);
    },
    onClose() {
      answering = false;
      hideHud();
    },
  };

  return {
    presentation,
    bindActions(next) {
      actions = next;
    },
    setResponseAction(action) {
      responseAction = action;
    },
    isVisible: () => visible,
  };
};
