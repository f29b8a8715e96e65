import type { ChatMode } from '../features/chat/domain/ChatMode.js';

/** Deployment name per mode */
export type AzureDeploymentMap = Record<ChatMode, string>;

export interface AzureOpenAIConfig {
    apiKey: string;
    endpoint: string;      // e.g. https://<resource>.openai.azure.com
    apiVersion: string;
    deployments: AzureDeploymentMap;
    temperature: number;
    timeoutMs: number;
}
