/**
 * LLM Module
 *
 * @module
 */

export {
  ApiChatModel,
  API_PROVIDERS,
  isApiProvider,
  splitSystemMessages,
  type APIProvider,
  type ApiChatModelConfig,
} from "./api-chat-model.js";
