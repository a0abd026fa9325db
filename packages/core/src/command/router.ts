import type { InputInjector } from '../session/types';
import { isPrintable, type CommandBufferEngine } from './engine';
import { createEventQueue, type EventQueue, type Scheduler } from './queue';
import type { CommandOutputEvent, InjectionRequest, InputEvent, Verdict } from './types';

export interface KeystrokeRouterOptions {
  engine: CommandBufferEngine;
  events: EventQueue<CommandOutputEvent>;
  injector: InputInjector;
  /**
   * True while the keyboard hook cannot hold consumed keys back, so each consumed key
   * also lands in the focused app and has to be erased along with the command.
   */
  consumedKeysReachHost?: () => boolean;
  schedule?: Scheduler;
  onError?: (error: unknown) => void;
}

export interface KeystrokeRouter {
  route(event: InputEvent): Verdict;
}

/** Characters a key adds to (or removes from) a plain text field. */
const hostEffect = (event: InputEvent) => {
  if (event.key === 'backspace') return -1;
  if (event.key === 'enter' || event.key === 'tab') return 1;
  return isPrintable(event.character) ? 1 : 0;
};

const endsLiveSession = (event: CommandOutputEvent) =>
  event.type === 'liveSubmit' || event.type === 'liveCancel';

const withLeadingDelete = (requests: InjectionRequest[], count: number): InjectionRequest[] => {
  const [first, ...rest] = requests;
  if (first?.kind === 'delete') return [{ kind: 'delete', count: first.count + count }, ...rest];
  return [{ kind: 'delete', count }, ...requests];
};

export const createKeystrokeRouter = (options: KeystrokeRouterOptions): KeystrokeRouter => {
  const { engine, events, injector } = options;
  let lastInjection: Promise<void> = Promise.resolve();
  let strayCharacters = 0;

  const report = (error: unknown) => {
    options.onError?.(error);
  };

  const inject = (request: InjectionRequest) =>
    request.kind === 'delete'
      ? injector.deleteCharacters(request.count)
      : injector.typeText(request.text);

  // Injections run one at a time, in posting order.
  const injections = createEventQueue<InjectionRequest>(
    (request) => {
      lastInjection = lastInjection.then(() => inject(request)).catch(report);
    },
    { schedule: options.schedule, onError: report }
  );

  const accountForHost = (
    event: InputEvent,
    outputEvents: CommandOutputEvent[],
    requests: InjectionRequest[]
  ) => {
    const effect = hostEffect(event);
    let adjusted = outputEvents;
    if (outputEvents.some((output) => output.type === 'liveModeStarted')) {
      // The key that opened the session sits right after the marker in the host.
      adjusted = outputEvents.map((output) =>
        output.type === 'liveModeStarted'
          ? { ...output, deleteCount: output.deleteCount + effect }
          : output
      );
    } else {
      strayCharacters = Math.max(0, strayCharacters + effect);
    }
    if (strayCharacters > 0 && (requests.length > 0 || outputEvents.some(endsLiveSession))) {
      const settled = withLeadingDelete(requests, strayCharacters);
      strayCharacters = 0;
      return { outputEvents: adjusted, requests: settled };
    }
    return { outputEvents: adjusted, requests };
  };

  return {
    route: (event) => {
      if (engine.getState().mode !== 'liveActive') strayCharacters = 0;
      const result = engine.handle(event);
      const reachesHost =
        result.verdict === 'consume' && (options.consumedKeysReachHost?.() ?? false);
      const { outputEvents, requests } = reachesHost
        ? accountForHost(event, result.events, result.injections)
        : { outputEvents: result.events, requests: result.injections };
      events.post(outputEvents);
      injections.post(requests);
      return result.verdict;
    },
  };
};
