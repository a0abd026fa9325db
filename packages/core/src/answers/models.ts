export const DEFAULT_MODEL = 'llama3.2:1b-instruct-q4_K_M';

export const PREFERRED_MODELS = [
  DEFAULT_MODEL,
  'qwen2.5:0.5b-instruct-q4_K_M',
  'phi3:mini',
  'tinyllama:latest',
] as const;

export const pickModel = (available: readonly string[], current: string) => {
  if (available.includes(current)) return current;
  const preferred = PREFERRED_MODELS.find((name) => available.includes(name));
  return preferred ?? available[0] ?? current;
};
