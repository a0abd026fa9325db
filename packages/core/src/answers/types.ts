import { z } from 'zod';

export const GenerationOptionsSchema = z.object({
  temperature: z.number().min(0).max(1).default(0.2),
  topP: z.number().min(0).max(1).default(0.9),
  maxTokens: z.number().int().min(32).max(8192).default(256),
});
export type GenerationOptions = z.infer<typeof GenerationOptionsSchema>;

export const GenerateResponseSchema = z.object({
  response: z.string().optional(),
  error: z.string().optional(),
  done: z.boolean().optional(),
});
export type GenerateResponse = z.infer<typeof GenerateResponseSchema>;

export const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()),
});

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(5).default(2),
  baseDelayMs: z.number().int().min(50).default(200),
});
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export type AnswerResult = { ok: true; answer: string } | { ok: false; error: Error };

export interface AnswerStreamHandle {
  cancel(): void;
}

export interface AnswerService {
  ask(question: string): Promise<AnswerResult>;
  askStream(
    question: string,
    onToken: (token: string) => void,
    onError: (error: Error) => void,
    onComplete: () => void
  ): AnswerStreamHandle;
}

export interface AnswerClient extends AnswerService {
  checkStatus(): Promise<boolean>;
  listModels(): Promise<string[]>;
  getModel(): string;
  setModel(model: string): void;
  setGeneration(options: Partial<GenerationOptions>): void;
}

export interface AnswerClientOptions {
  fetcher: typeof fetch;
  baseUrl: string;
  model: string;
  generation?: Partial<GenerationOptions>;
  sleep?: (ms: number) => Promise<void>;
}
