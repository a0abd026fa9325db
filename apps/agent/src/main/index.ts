import {
  createAnswerClient,
  createCommandBufferEngine,
  createCommandController,
  createEventQueue,
  createKeystrokeRouter,
  createTriggerRegistry,
  pickModel,
  type AnswerClient,
  type CommandBufferEngine,
  type CommandController,
  type CommandOutputEvent,
  type KeystrokeRouter,
  type Settings,
  type SettingsRepository,
  type TriggerRegistry,
} from '@keyprompt/core';
import type { KeyboardHookHandle } from '@keyprompt/platform';
import { configureLogging } from './logger';
import { exportDiagnostics, recordError } from './diagnostics';
import { keepProcessAlive, type KeepAlive } from './keepAlive';
import { platformAdapter } from './platform';
import { createConsolePresentation, type ConsolePresentation } from './presentation';
import { createFileSettingsRepository, resolveDataDir } from './store';

const dataDir = resolveDataDir();
const log = configureLogging(dataDir);
const hookEnabled = process.env.KEYPROMPT_DISABLE_HOOK !== '1';
const settingsRepository: SettingsRepository = createFileSettingsRepository(dataDir);

let settings: Settings;
let answers: AnswerClient;
let triggers: TriggerRegistry;
let engine: CommandBufferEngine;
let controller: CommandController;
let router: KeystrokeRouter;
let hud: ConsolePresentation;
let hookHandle: KeyboardHookHandle | null = null;
let keepAlive: KeepAlive | null = null;
let shuttingDown = false;

const report = (error: unknown) => {
  recordError(dataDir, error);
};

const persistSettings = () => settingsRepository.set(settings);

const generationFromSettings = (source: Settings) => ({
  temperature: source.temperature,
  topP: source.topP,
  maxTokens: source.maxTokens,
});

const openAccessibilitySettings = async (reason: string) => {
  const guidance = await platformAdapter.permissions.requestGuidance();
  log.warn(`${reason}\n${guidance}`);
  try {
    await platformAdapter.permissions.openSettings();
  } catch (error) {
    report(error);
  }
};

const startKeyboardHook = async () => {
  const permissions = await platformAdapter.permissions.check();
  if (permissions.accessibility === 'denied') {
    await openAccessibilitySettings('Accessibility permission is not granted.');
    return;
  }
  let handle: KeyboardHookHandle;
  try {
    handle = await platformAdapter.keyboard.start((keystroke) => router.route(keystroke), {
      layout: settings.keyboardLayout,
    });
  } catch (error) {
    report(error);
    await openAccessibilitySettings('Failed to start the keyboard hook.');
    return;
  }
  hookHandle = handle;
  if (!handle.suppressesEvents) {
    log.warn(
      'This keyboard hook can only observe keys; consumed keystrokes still reach the focused application.'
    );
  }
  log.info(`Watching for "${triggers.getActive()}" and "${settings.mentionMarker}"`);
};

const checkAnswerBackend = async () => {
  if (!(await answers.checkStatus())) {
    log.warn(`Ollama is not reachable at ${settings.ollamaBaseUrl}. Start it with: ollama serve`);
    return;
  }
  try {
    const available = await answers.listModels();
    const model = pickModel(available, settings.model);
    if (model !== settings.model) {
      log.info(`Model ${settings.model} is not installed, using ${model}`);
      settings = { ...settings, model };
      answers.setModel(model);
      await persistSettings();
    }
  } catch (error) {
    report(error);
  }
};

const completeFirstRun = async () => {
  if (settings.firstRunCompleted) return;
  log.info(
    [
      'Welcome to keyprompt.',
      `Type "${triggers.getActive()}<question>" and press Enter to ask inline,`,
      `or type "${settings.mentionMarker}" followed by your question for a live answer.`,
      `Settings live in ${dataDir}/state.json. Send SIGHUP to reload them.`,
    ].join('\n')
  );
  settings = { ...settings, firstRunCompleted: true };
  await persistSettings();
};

const reloadSettings = async () => {
  const next = await settingsRepository.get();
  if (next.activeTrigger !== triggers.getActive()) {
    if (triggers.getSupported().includes(next.activeTrigger)) {
      triggers.setActive(next.activeTrigger);
      log.info(`Active trigger changed to "${triggers.getActive()}"`);
    } else {
      log.warn(`Trigger "${next.activeTrigger}" needs a restart to take effect`);
    }
  }
  answers.setModel(next.model);
  answers.setGeneration(generationFromSettings(next));
  hud.setResponseAction(next.responseAction);
  settings = { ...next, activeTrigger: triggers.getActive() };
  log.info('Settings reloaded');
};

const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  controller.cancel();
  engine.dispose();
  try {
    await hookHandle?.stop();
  } catch (error) {
    report(error);
  }
  hookHandle = null;
  keepAlive?.release();
  keepAlive = null;
  log.info('keyprompt stopped');
};

const main = async () => {
  settings = await settingsRepository.get();

  answers = createAnswerClient({
    fetcher: fetch,
    baseUrl: settings.ollamaBaseUrl,
    model: settings.model,
    generation: generationFromSettings(settings),
  });

  hud = createConsolePresentation({
    logger: log,
    responseAction: settings.responseAction,
    onError: report,
  });

  controller = createCommandController({
    answers,
    injector: platformAdapter.injector,
    clipboard: (text) => platformAdapter.clipboard.set(text),
    presentation: hud.presentation,
    insertSettleDelayMs: settings.insertSettleDelayMs,
    onError: report,
  });
  hud.bindActions(controller);

  const events = createEventQueue<CommandOutputEvent>((event) => controller.handleEvent(event), {
    onError: report,
  });

  triggers = createTriggerRegistry({
    supported: settings.supportedTriggers,
    active: settings.activeTrigger,
  });

  engine = createCommandBufferEngine({
    triggers,
    mentionMarker: settings.mentionMarker,
    onReset: (resetEvents) => events.post(resetEvents),
  });

  router = createKeystrokeRouter({
    engine,
    events,
    injector: platformAdapter.injector,
    consumedKeysReachHost: () => hookHandle !== null && !hookHandle.suppressesEvents,
    onError: report,
  });

  await completeFirstRun();
  await checkAnswerBackend();

  if (hookEnabled) {
    await startKeyboardHook();
  } else {
    log.info('Keyboard hook disabled by KEYPROMPT_DISABLE_HOOK');
    keepAlive = keepProcessAlive();
  }

  process.on('SIGHUP', () => {
    reloadSettings().catch(report);
  });
  process.on('SIGUSR2', () => {
    exportDiagnostics(dataDir)
      .then(({ filePath }) => log.info(`Diagnostics written to ${filePath}`))
      .catch(report);
  });
  const stop = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        report(error);
        process.exit(1);
      });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
};

main().catch((error: unknown) => {
  report(error);
  process.exitCode = 1;
});
