export {
  AnthropicCompletionClient,
  type AnthropicCompletionConfig,
  type CompletionClient,
  type CompletionOptions,
} from "./client.js";
