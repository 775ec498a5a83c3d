export * from "./providers/ProviderTypes.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./providers/ProviderRegistry.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolArguments.js";
export * from "./tools/ToolRegistry.js";
export * from "./tools/ToolDispatcher.js";
export * from "./tools/repository/RepositoryToolCatalog.js";
export * from "./tools/repository/RepositoryTools.js";
export * from "./cognitive/Prompts.js";
export * from "./cognitive/ContextSummarizer.js";
export * from "./runtime/ConversationState.js";
export * from "./runtime/ConversationDriver.js";
export * from "./runtime/EventNotifier.js";
export * from "./runtime/RunLogger.js";
export * from "./runtime/RepoAnalyzer.js";
export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./cli/AnalyzerFactory.js";
export { RelayServer, createRelayServer } from "./cli/ServeCommand.js";
