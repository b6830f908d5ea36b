import OpenAI from 'openai';
import { parseModelResponse } from './parse';
import { SYSTEM_PROMPT, buildDecisionPrompt } from './prompts';
import type { ChatModelOptions } from './types';
import type { DecisionModel } from '../core/collaborators';

/** DeepSeek and DashScope (Qwen) both speak the OpenAI chat-completions protocol. */
export function createOpenAIAdapter(id: string, opts: ChatModelOptions): DecisionModel {
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  return {
    id,
    async decide(context) {
      const res = await client.chat.completions.create({
        model: opts.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildDecisionPrompt(context) },
        ],
        temperature: opts.temperature,
        top_p: opts.topP,
        max_tokens: opts.maxTokens,
      });
      const content = res.choices?.[0]?.message?.content ?? '';
      return parseModelResponse(content.trim());
    },
  };
}
