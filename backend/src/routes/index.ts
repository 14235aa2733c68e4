export {
  default as chatCompletionsRoutes,
  type ChatCompletionsRoutesOptions,
} from "./chat-completions";
export { default as metricsRoutes } from "./metrics";
export { default as modelRoutes } from "./models";
