/**
 * Providers Module
 *
 * Chat completions and the model catalog, both served by OpenRouter.
 */

export {
  OpenRouterCompletionService,
  createCompletionService,
  type ChatCompletionService,
  type CompletionRequest,
  type CompletionServiceOptions,
} from './completion.js';

export {
  fetchModelCatalog,
  filterFreeModels,
  findModel,
  resolveModel,
  DEFAULT_CONTEXT_LENGTH,
  type CatalogEntry,
  type ModelDescriptor,
  type FetchModelCatalogOptions,
} from './models.js';
