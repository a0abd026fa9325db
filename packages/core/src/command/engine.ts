import { extractQuestion, normalizeQuotes } from './quotes';
import type { TriggerRegistry } from './triggers';
import type {
  CommandOutputEvent,
  EngineMode,
  EngineSnapshot,
  HandleResult,
  InjectionRequest,
  InputEvent,
  Verdict,
} from './types';

export const COMMAND_BUFFER_LIMIT = 500;
export const DEFAULT_MENTION_MARKER = '@craig';
export const TAB_COMPLETION_HINT = 'Press Tab to autocomplete';

const MENTION_DELIMITERS = [' ', ':', ','];

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Splits into user-perceived characters, the unit a host editor's Backspace removes. */
export const graphemes = (value: string) =>
  Array.from(segmenter.segment(value), ({ segment }) => segment);

const characterCount = (value: string) => graphemes(value).length;

const dropLastCharacter = (value: string) => graphemes(value).slice(0, -1).join('');

export const keepLastCharacters = (value: string, limit: number) => {
  const characters = graphemes(value);
  if (characters.length <= limit) return value;
  return characters.slice(characters.length - limit).join('');
};

export const isPrintable = (character: string | null): character is string =>
  Boolean(character) && !/\p{Cc}/u.test(character ?? '');

/** Marker prefixes ordered longest first: "@craig", "@crai", ..., "@". */
export const mentionCandidates = (marker: string) => {
  const characters = graphemes(marker.toLowerCase());
  return characters.map((_, index) => characters.slice(0, characters.length - index).join(''));
};

/**
 * Characters to erase for a marker at the end of `lowerBuffer`: the marker plus one
 * delimiter, the bare marker, or null when the buffer does not end in the marker.
 */
export const detectMention = (lowerBuffer: string, marker: string) => {
  const lowerMarker = marker.toLowerCase();
  const markerLength = characterCount(lowerMarker);
  if (MENTION_DELIMITERS.some((delimiter) => lowerBuffer.endsWith(lowerMarker + delimiter))) {
    return markerLength + 1;
  }
  if (lowerBuffer.endsWith(lowerMarker)) return markerLength;
  return null;
};

export interface CommandBufferEngineOptions {
  triggers: TriggerRegistry;
  mentionMarker?: string;
  bufferLimit?: number;
  /** Receives the events produced by a reset that happens outside `handle()`. */
  onReset?: (events: CommandOutputEvent[]) => void;
}

export interface CommandBufferEngine {
  handle(event: InputEvent): HandleResult;
  reset(): CommandOutputEvent[];
  getState(): EngineSnapshot;
  dispose(): void;
}

export const createCommandBufferEngine = (
  options: CommandBufferEngineOptions
): CommandBufferEngine => {
  const { triggers } = options;
  const marker = (options.mentionMarker ?? DEFAULT_MENTION_MARKER).toLowerCase();
  const candidates = mentionCandidates(marker);
  const bufferLimit = options.bufferLimit ?? COMMAND_BUFFER_LIMIT;

  let mode: EngineMode = 'idle';
  let buffer = '';
  let liveBuffer: string | null = null;

  const clear = () => {
    mode = 'idle';
    buffer = '';
    liveBuffer = null;
  };

  const reset = (): CommandOutputEvent[] => {
    const events: CommandOutputEvent[] = [];
    if (mode === 'liveActive') events.push({ type: 'liveCancel' });
    events.push({ type: 'exitCommandMode' });
    clear();
    return events;
  };

  const unsubscribe = triggers.subscribe(() => {
    const events = reset();
    options.onReset?.(events);
  });

  const handle = (event: InputEvent): HandleResult => {
    const events: CommandOutputEvent[] = [];
    const injections: InjectionRequest[] = [];
    const finish = (verdict: Verdict): HandleResult => ({ verdict, events, injections });

    if (mode !== 'liveActive' && event.key === 'tab') {
      const lower = buffer.toLowerCase();
      const match = candidates.find((candidate) => lower.endsWith(candidate));
      if (match !== undefined) {
        if (match !== marker) {
          const completion = `${marker.slice(match.length)} `;
          injections.push({ kind: 'type', text: completion });
          buffer = keepLastCharacters(buffer + completion, bufferLimit);
          events.push(
            { type: 'enterCommandMode', triggerLabel: marker },
            { type: 'previewUpdate', text: '', triggerLabel: marker }
          );
          return finish('consume');
        }
        if (!lower.endsWith(`${marker} `)) {
          injections.push({ kind: 'type', text: ' ' });
          buffer = keepLastCharacters(`${buffer} `, bufferLimit);
        }
        return finish('consume');
      }
    }

    if (mode !== 'liveActive') {
      const deleteCount = detectMention(buffer.toLowerCase(), marker);
      if (deleteCount !== null) {
        mode = 'liveActive';
        liveBuffer = '';
        events.push({ type: 'liveModeStarted', deleteCount });
      }
    }

    if (mode === 'liveActive') {
      const text = liveBuffer ?? '';
      if (event.key === 'enter') {
        events.push({ type: 'liveSubmit', text });
        clear();
        return finish('consume');
      }
      if (event.key === 'escape') {
        events.push({ type: 'liveCancel' });
        clear();
        return finish('consume');
      }
      if (event.key === 'backspace') {
        liveBuffer = dropLastCharacter(text);
        events.push({ type: 'liveBufferUpdated', text: liveBuffer });
        return finish('consume');
      }
      if (isPrintable(event.character)) {
        liveBuffer = text + event.character;
        events.push({ type: 'liveBufferUpdated', text: liveBuffer });
        return finish('consume');
      }
      return finish('passThrough');
    }

    const trigger = triggers.getActive();
    const label = triggers.getLabel();

    if (event.key === 'enter') {
      if (buffer.toLowerCase().startsWith(trigger)) {
        const question = extractQuestion(buffer.slice(trigger.length));
        if (question) {
          injections.push({ kind: 'delete', count: characterCount(buffer) });
          events.push({ type: 'deferredTriggerFired', question });
          clear();
          events.push({ type: 'exitCommandMode' });
          return finish('consume');
        }
      }
      clear();
      events.push({ type: 'exitCommandMode' });
      return finish('passThrough');
    }

    if (event.key === 'backspace') {
      buffer = dropLastCharacter(buffer);
      if (buffer.toLowerCase().startsWith(trigger)) {
        mode = 'deferredPending';
        events.push({
          type: 'previewUpdate',
          text: normalizeQuotes(buffer.slice(trigger.length)),
          triggerLabel: label,
        });
      } else {
        mode = 'idle';
        events.push({ type: 'exitCommandMode' });
      }
      return finish('passThrough');
    }

    if (!isPrintable(event.character)) return finish('passThrough');

    buffer += normalizeQuotes(event.character);
    const hinted = buffer.toLowerCase();
    if (candidates.some((candidate) => hinted.endsWith(candidate))) {
      events.push(
        { type: 'enterCommandMode', triggerLabel: marker },
        { type: 'previewUpdate', text: TAB_COMPLETION_HINT, triggerLabel: marker }
      );
    }
    buffer = keepLastCharacters(buffer, bufferLimit);

    const lower = buffer.toLowerCase();
    if (lower.startsWith(trigger)) {
      mode = 'deferredPending';
      events.push(
        { type: 'enterCommandMode', triggerLabel: label },
        { type: 'previewUpdate', text: buffer.slice(trigger.length), triggerLabel: label }
      );
    } else if (!trigger.startsWith(lower) && characterCount(lower) >= characterCount(trigger)) {
      events.push({ type: 'exitCommandMode' });
      clear();
    } else {
      mode = 'idle';
    }
    return finish('passThrough');
  };

  return {
    handle,
    reset,
    getState: () => ({ mode, buffer, liveBuffer }),
    dispose: unsubscribe,
  };
};
