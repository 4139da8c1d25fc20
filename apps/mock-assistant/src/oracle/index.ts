export { OpenAIOracle, type OpenAIOracleConfig } from "./openai-oracle.js";
