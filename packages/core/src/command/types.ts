export type ControlKey = 'enter' | 'backspace' | 'escape' | 'tab' | 'other';

export interface KeyModifiers {
  shift: boolean;
  control: boolean;
  alt: boolean;
  meta: boolean;
}

export interface InputEvent {
  character: string | null;
  key: ControlKey;
  modifiers: KeyModifiers;
}

export type Verdict = 'consume' | 'passThrough';

export type EngineMode = 'idle' | 'deferredPending' | 'liveActive';

export type CommandOutputEvent =
  | { type: 'previewUpdate'; text: string; triggerLabel: string }
  | { type: 'enterCommandMode'; triggerLabel: string }
  | { type: 'exitCommandMode' }
  | { type: 'deferredTriggerFired'; question: string }
  | { type: 'liveModeStarted'; deleteCount: number }
  | { type: 'liveBufferUpdated'; text: string }
  | { type: 'liveSubmit'; text: string }
  | { type: 'liveCancel' };

export type InjectionRequest =
  | { kind: 'delete'; count: number }
  | { kind: 'type'; text: string };

export interface HandleResult {
  verdict: Verdict;
  events: CommandOutputEvent[];
  injections: InjectionRequest[];
}

export interface EngineSnapshot {
  mode: EngineMode;
  buffer: string;
  liveBuffer: string | null;
}
