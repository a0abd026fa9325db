export interface InputInjector {
  deleteCharacters(count: number): Promise<void>;
  typeText(text: string): Promise<void>;
  paste(text: string): Promise<void>;
}

export interface PresentationLayer {
  onPreviewUpdate(text: string, triggerLabel: string): void;
  onEnterCommandMode(triggerLabel: string): void;
  onExitCommandMode(): void;
  onDeferredFire(question: string): void;
  onLiveStart(deleteCount: number): void;
  onLiveUpdate(text: string): void;
  onLiveSubmit(text: string): void;
  onLiveCancel(): void;
  onAnswerToken(partial: string): void;
  onAnswer(answer: string): void;
  onAnswerError(message: string): void;
  onClose(): void;
}

export type ControllerState = 'idle' | 'answering' | 'streaming' | 'ready' | 'error';
