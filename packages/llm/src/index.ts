export * from "./agent-client";
export * from "./config";
export { OpenAICompatibleAgentClient, type OpenAICompatibleOptions } from "./openai-compatible/openai-compatible-client";
export { GeminiAgentClient, type GeminiModels, type GeminiOptions } from "./gemini/gemini-client";
export {
  ScriptedAgentClient,
  type RecordedCall,
  type ScriptedResponse,
} from "./scripted/scripted-client";
