export * from "./github/GitHubContentClient.js";
export * from "./channels/EventChannel.js";
export * from "./channels/WebSocketEventChannel.js";
