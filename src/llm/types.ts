export type LLMProvider = 'deepseek' | 'qwen' | 'mock';

export interface ChatModelOptions {
  apiKey: string;
  model: string;
  baseURL: string;
  temperature: number;
  topP: number;
  maxTokens: number;
}

export const PROVIDER_DEFAULTS: Record<Exclude<LLMProvider, 'mock'>, { label: string; keyEnv: string }> = {
  deepseek: { label: 'DeepSeek', keyEnv: 'DEEPSEEK_API_KEY' },
  qwen: { label: 'Qwen', keyEnv: 'DASHSCOPE_API_KEY' },
};
