import type { LanguageModel } from 'ai';

import { ErnieClient, type FetchLike } from './ernie.js';
import { OpenAICompatibleClient } from './openai-compatible.js';
import type { Clock, ModelClient, ModelConfig, ProviderName } from './types.js';

/** Wire protocol family a provider speaks */
export type ProviderFamily = 'openai-compatible' | 'ernie';

export interface ProviderProfile {
  readonly name: ProviderName;
  readonly label: string;
  readonly family: ProviderFamily;
  readonly defaultApiBase: string;
  readonly apiKeyEnv: string;
  readonly secretKeyEnv?: string;
}

const PROVIDERS: ReadonlyMap<ProviderName, ProviderProfile> = new Map<
  ProviderName,
  ProviderProfile
>([
  [
    'dashscope',
    {
      name: 'dashscope',
      label: 'Alibaba DashScope (Qwen)',
      family: 'openai-compatible',
      defaultApiBase: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
      apiKeyEnv: 'DASHSCOPE_API_KEY',
    },
  ],
  [
    'deepseek',
    {
      name: 'deepseek',
      label: 'DeepSeek',
      family: 'openai-compatible',
      defaultApiBase: 'https://api.deepseek.com/v1',
      apiKeyEnv: 'DEEPSEEK_API_KEY',
    },
  ],
  [
    'zhipu',
    {
      name: 'zhipu',
      label: 'Zhipu AI (GLM)',
      family: 'openai-compatible',
      defaultApiBase: 'https://open.bigmodel.cn/api/paas/v4',
      apiKeyEnv: 'ZHIPU_API_KEY',
    },
  ],
  [
    'doubao',
    {
      name: 'doubao',
      label: 'Volcengine Ark (Doubao)',
      family: 'openai-compatible',
      defaultApiBase: 'https://ark.cn-beijing.volces.com/api/v3',
      apiKeyEnv: 'ARK_API_KEY',
    },
  ],
  [
    'moonshot',
    {
      name: 'moonshot',
      label: 'Moonshot (Kimi)',
      family: 'openai-compatible',
      defaultApiBase: 'https://api.moonshot.cn/v1',
      apiKeyEnv: 'MOONSHOT_API_KEY',
    },
  ],
  [
    'openai',
    {
      name: 'openai',
      label: 'OpenAI',
      family: 'openai-compatible',
      defaultApiBase: 'https://api.openai.com/v1',
      apiKeyEnv: 'OPENAI_API_KEY',
    },
  ],
  [
    'baidu',
    {
      name: 'baidu',
      label: 'Baidu Qianfan (ERNIE)',
      family: 'ernie',
      defaultApiBase:
        'https://aip.baidubce.com/rpc/2.0/ai_custom/v1/wenxinworkshop/chat',
      apiKeyEnv: 'BAIDU_API_KEY',
      secretKeyEnv: 'BAIDU_SECRET_KEY',
    },
  ],
]);

/**
 * @throws for a provider tag that has no profile
 */
export function getProviderProfile(name: ProviderName): ProviderProfile {
  const profile = PROVIDERS.get(name);
  if (!profile) {
    const supported = Array.from(PROVIDERS.keys()).join(', ');
    throw new Error(
      `Unknown provider "${name}". Supported providers: ${supported}`,
    );
  }
  return profile;
}

export function listProviders(): readonly ProviderProfile[] {
  return Array.from(PROVIDERS.values());
}

export interface ClientDependencies {
  /** Environment consulted for keys that the config leaves out */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly fetch?: FetchLike;
  readonly clock?: Clock;
  /** Builds the SDK model for OpenAI-compatible providers */
  readonly languageModelFor?: (config: ModelConfig) => LanguageModel | undefined;
}

export interface ResolvedCredentials {
  readonly apiKey?: string;
  readonly secretKey?: string;
}

/** Inline keys win over environment variables */
export function resolveCredentials(
  config: ModelConfig,
  env: Readonly<Record<string, string | undefined>> = process.env,
): ResolvedCredentials {
  const profile = getProviderProfile(config.provider);
  const apiKey = config.apiKey || env[config.apiKeyEnv ?? profile.apiKeyEnv];
  const secretEnv = config.secretKeyEnv ?? profile.secretKeyEnv;
  const secretKey =
    config.secretKey || (secretEnv !== undefined ? env[secretEnv] : undefined);

  return {
    apiKey: apiKey || undefined,
    secretKey: secretKey || undefined,
  };
}

/** Picks the client implementation for the config's provider tag */
export function createModelClient(
  config: ModelConfig,
  deps: ClientDependencies = {},
): ModelClient {
  const profile = getProviderProfile(config.provider);
  const { apiKey, secretKey } = resolveCredentials(config, deps.env);
  const apiBase = (config.apiBase || profile.defaultApiBase).replace(/\/+$/, '');

  switch (profile.family) {
    case 'openai-compatible':
      return new OpenAICompatibleClient({
        name: config.name,
        provider: config.provider,
        modelId: config.modelId,
        apiBase,
        apiKey,
        recommendedKeyLocation: config.recommendedKeyLocation,
        languageModel: deps.languageModelFor?.(config),
        clock: deps.clock,
      });
    case 'ernie':
      return new ErnieClient({
        name: config.name,
        modelId: config.modelId,
        apiBase,
        apiKey,
        secretKey,
        recommendedKeyLocation: config.recommendedKeyLocation,
        fetch: deps.fetch,
        clock: deps.clock,
      });
  }
}
