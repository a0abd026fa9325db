import { describe, expect, it, vi } from 'vitest';
import { createConsolePresentation } from '../../../apps/agent/src/main/presentation';
import type { ResponseAction } from '../../../apps/agent/src/main/presentation';

const setup = (responseAction: ResponseAction) => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const onError = vi.fn();
  const actions = {
    insert: vi.fn(async () => 'inserted'),
    copy: vi.fn(async () => undefined),
    close: vi.fn(),
  };
  const hud = createConsolePresentation({ logger, responseAction, onError });
  hud.bindActions(actions);
  return { hud, logger, actions, onError };
};

describe('console presentation', () => {
  it('logs each distinct overlay line once', () => {
    const { hud, logger } = setup('preview');

    hud.presentation.onPreviewUpdate('', '/craig');
    hud.presentation.onEnterCommandMode('/craig');
    hud.presentation.onPreviewUpdate('hi', '/craig');
    hud.presentation.onExitCommandMode();
    hud.presentation.onExitCommandMode();

    expect(logger.info.mock.calls).toEqual([
      ['[hud] /craig'],
      ['[hud] /craig hi'],
      ['[hud] hidden'],
    ]);
    expect(hud.isVisible()).toBe(false);
  });

  it('keeps the question on screen until the answer arrives', () => {
    const { hud, logger } = setup('preview');

    hud.presentation.onDeferredFire('what is 2+2');
    hud.presentation.onExitCommandMode();

    expect(hud.isVisible()).toBe(true);

    hud.presentation.onAnswer('4');
    hud.presentation.onExitCommandMode();

    expect(logger.info.mock.calls).toEqual([
      ['[hud] Thinking about: what is 2+2'],
      ['[hud] 4'],
      ['[hud] hidden'],
    ]);
    expect(hud.isVisible()).toBe(false);
  });

  it('hides the overlay after a failed answer once command mode ends', () => {
    const { hud } = setup('preview');

    hud.presentation.onLiveSubmit(' why ');
    hud.presentation.onExitCommandMode();
    expect(hud.isVisible()).toBe(true);

    hud.presentation.onAnswerError('Error: boom');
    hud.presentation.onExitCommandMode();
    expect(hud.isVisible()).toBe(false);
  });

  it('inserts answers when configured to', () => {
    const { hud, actions } = setup('insert');

    hud.presentation.onAnswer('4');

    expect(actions.insert).toHaveBeenCalledWith('4');
    expect(actions.copy).not.toHaveBeenCalled();
  });

  it('copies answers and closes the overlay when configured to', async () => {
    const { hud, actions, logger } = setup('clipboard');

    hud.presentation.onAnswer('4');

    expect(actions.copy).toHaveBeenCalledWith('4');
    await vi.waitFor(() => expect(actions.close).toHaveBeenCalled());
    expect(logger.info).toHaveBeenCalledWith('Answer copied to clipboard');
  });

  it('only shows answers in preview mode', () => {
    const { hud, actions, logger } = setup('preview');

    hud.presentation.onAnswer('4');

    expect(actions.insert).not.toHaveBeenCalled();
    expect(actions.copy).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('[hud] 4');
  });

  it('reports failed inserts', async () => {
    const { hud, actions, onError } = setup('insert');
    const failure = new Error('paste failed');
    actions.insert.mockRejectedValueOnce(failure);

    hud.presentation.onAnswer('4');

    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith(failure));
  });

  it('switches the response action at runtime', () => {
    const { hud, actions } = setup('preview');

    hud.setResponseAction('insert');
    hud.presentation.onAnswer('4');

    expect(actions.insert).toHaveBeenCalledWith('4');
  });

  it('logs answer errors as warnings', () => {
    const { hud, logger } = setup('insert');

    hud.presentation.onAnswerError('Error: boom');

    expect(logger.warn).toHaveBeenCalledWith('Error: boom');
  });
});
