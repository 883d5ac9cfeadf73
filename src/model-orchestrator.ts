/**
 * model-orchestrator.ts
 * Keeps the requested model resident on the LLM backend before a chat request
 * is forwarded, and merges stored profile values into the request.
 *
 * The backend holds one large model at a time, so loading a model first
 * unloads every other loaded model.
 */

import type { BackendClient, BackendResponse } from './backend-client.js';
import type { BackendRegistry } from './config/backend-registry.js';
import type { ModelsConfig } from './config/schema.js';
import { ERROR_MESSAGES } from './constants/index.js';
import type { ChatCompletionRequest, LogicalModel } from './gateway.types.js';
import type { ModelProfileStore } from './model-profile-store.js';
import { collapseSplitModels, findLogicalModel, parseModelList } from './model-registry.js';
import { selectModel } from './model-selection.js';
import { applyProfileDefaults } from './profile-defaults.js';
import { KeyedMutex, sleep } from './utils/async-helpers.js';
import { getErrorMessage } from './utils/error-helpers.js';
import {
  GatewayError,
  ModelLoadFailedError,
  ModelLoadTimeoutError,
  ModelNotFoundError,
} from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('model-orchestrator');

export type LoadOutcome = 'loaded' | 'failed' | 'timed-out';

export interface ModelOrchestratorOptions {
  client: BackendClient;
  registry: BackendRegistry;
  /** Registry name of the LLM router backend */
  backend: string;
  config: ModelsConfig;
  profiles: ModelProfileStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface PreparedChatRequest {
  payload: ChatCompletionRequest;
  model: string;
  auto: boolean;
}

export class ModelOrchestrator {
  private readonly loadLocks = new KeyedMutex();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: ModelOrchestratorOptions) {
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  get backend(): string {
    return this.options.backend;
  }

  private get baseUrl(): string {
    return this.options.registry.url(this.options.backend);
  }

  /**
   * The backend's registry with split parts merged
   */
  async listModels(): Promise<LogicalModel[]> {
    const response = await this.options.client.request(
      this.options.backend,
      'GET',
      `${this.baseUrl}/models`,
      { timeoutClass: 'default' }
    );
    if (!response.ok) {
      throw new GatewayError(
        ERROR_MESSAGES.BACKEND_ERROR,
        502,
        ERROR_MESSAGES.MODEL_LIST_FAILED(response.status)
      );
    }
    let body: unknown;
    try {
      body = response.json();
    } catch (error) {
      throw new GatewayError(ERROR_MESSAGES.BACKEND_ERROR, 502, getErrorMessage(error));
    }
    return collapseSplitModels(parseModelList(body));
  }

  /**
   * Return once the model is loaded. Idempotent.
   *
   * @throws ModelNotFoundError when the backend does not list the model
   * @throws ModelLoadFailedError when the load command is rejected or the backend reports failure
   * @throws ModelLoadTimeoutError when the model is not loaded before the deadline
   */
  async ensureModelLoaded(modelId: string): Promise<void> {
    if (!this.options.config.serializeLoads) {
      return this.runLoad(modelId);
    }
    return this.loadLocks.runExclusive(this.options.backend, () => this.runLoad(modelId));
  }

  /**
   * Unload every loaded or loading part of a logical model
   */
  async unloadModel(modelId: string): Promise<BackendResponse[]> {
    const models = await this.listModels();
    const target = findLogicalModel(models, modelId);
    if (!target) {
      throw new ModelNotFoundError(modelId);
    }
    const responses: BackendResponse[] = [];
    for (const partId of target.parts ?? [target.id]) {
      responses.push(await this.sendUnload(partId));
    }
    return responses;
  }

  /**
   * Resolve the model, make sure it is resident and fill in stored defaults
   */
  async prepareChatRequest(payload: ChatCompletionRequest): Promise<PreparedChatRequest> {
    const selection = selectModel(payload.model, payload.messages, this.options.config);
    if (selection.auto) {
      log.info(`Auto-selected model ${selection.model}`);
    }
    await this.ensureModelLoaded(selection.model);
    const profile = await this.options.profiles.getProfile(selection.model);
    const merged = applyProfileDefaults({ ...payload, model: selection.model }, profile);
    return { payload: merged, model: selection.model, auto: selection.auto };
  }

  private async runLoad(modelId: string): Promise<void> {
    const models = await this.listModels();
    const target = findLogicalModel(models, modelId);
    if (!target) {
      throw new ModelNotFoundError(modelId);
    }

    for (const other of models) {
      if (other === target || other.status.value !== 'loaded') {
        continue;
      }
      await this.unloadBestEffort(other);
    }

    if (target.status.value === 'loaded') {
      return;
    }

    if (target.status.value !== 'loading') {
      const response = await this.options.client.request(
        this.options.backend,
        'POST',
        `${this.baseUrl}/models/load`,
        { json: { model: target.id }, timeoutClass: 'llm' }
      );
      if (response.status !== 200) {
        throw new ModelLoadFailedError(
          modelId,
          ERROR_MESSAGES.MODEL_LOAD_REJECTED(target.id, response.status)
        );
      }
      log.info(`Loading model ${target.id}`);
    }

    const outcome = await this.waitForModel(target.id);
    switch (outcome) {
      case 'loaded':
        log.info(`Model ${target.id} loaded`);
        return;
      case 'failed':
        throw new ModelLoadFailedError(modelId);
      case 'timed-out':
        throw new ModelLoadTimeoutError(modelId, this.options.config.loadTimeoutMs);
    }
  }

  /**
   * Poll the registry until the model settles or the deadline passes
   */
  async waitForModel(modelId: string): Promise<LoadOutcome> {
    const { pollIntervalMs, loadTimeoutMs } = this.options.config;
    const deadline = this.now() + loadTimeoutMs;

    for (;;) {
      const target = findLogicalModel(await this.listModels(), modelId);
      if (target?.status.failed) {
        return 'failed';
      }
      if (target?.status.value === 'loaded') {
        return 'loaded';
      }
      if (this.now() >= deadline) {
        return 'timed-out';
      }
      await this.sleep(pollIntervalMs);
    }
  }

  private async unloadBestEffort(model: LogicalModel): Promise<void> {
    for (const partId of model.parts ?? [model.id]) {
      try {
        const response = await this.sendUnload(partId);
        if (response.ok) {
          log.info(`Unloaded model ${partId}`);
        } else {
          log.warn(`Unload of ${partId} returned HTTP ${response.status}`);
        }
      } catch (error) {
        log.warn(`Unload of ${partId} failed: ${getErrorMessage(error)}`);
      }
    }
  }

  private sendUnload(modelId: string): Promise<BackendResponse> {
    return this.options.client.request(
      this.options.backend,
      'POST',
      `${this.baseUrl}/models/unload`,
      { json: { model: modelId }, timeoutClass: 'default' }
    );
  }
}
