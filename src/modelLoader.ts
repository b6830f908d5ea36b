import pino from 'pino';
import { createOpenAIAdapter } from './llm/openai';
import { createMockAdapter } from './llm/mock';
import { PROVIDER_DEFAULTS } from './llm/types';
import type { AppConfig } from './config';
import type { DecisionModel } from './core/collaborators';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export function loadDecisionModel(cfg: AppConfig): DecisionModel {
  const provider = cfg.DECISION_MODEL;
  if (provider === 'mock') return createMockAdapter('mock', cfg.QUOTE_ASSET);

  const { label, keyEnv } = PROVIDER_DEFAULTS[provider];
  const apiKey = provider === 'deepseek' ? cfg.DEEPSEEK_API_KEY : cfg.DASHSCOPE_API_KEY;
  if (!apiKey) {
    throw new Error(`${label} selected but ${keyEnv} is not set`);
  }
  const sampling = { temperature: cfg.LLM_TEMPERATURE, topP: cfg.LLM_TOP_P, maxTokens: cfg.LLM_MAX_TOKENS };
  const model =
    provider === 'deepseek'
      ? createOpenAIAdapter(provider, { apiKey, model: cfg.DEEPSEEK_MODEL, baseURL: cfg.DEEPSEEK_BASE_URL, ...sampling })
      : createOpenAIAdapter(provider, { apiKey, model: cfg.QWEN_MODEL, baseURL: cfg.QWEN_BASE_URL, ...sampling });
  logger.info({ provider, model: provider === 'deepseek' ? cfg.DEEPSEEK_MODEL : cfg.QWEN_MODEL }, `${label} decision model ready`);
  return model;
}
