import type { RepositoryContentSource } from "@reposcout/integrations";
import type { ToolDefinition, ToolDescriptor, ToolHandler } from "../ToolTypes.js";
import {
  GENERATE_SUMMARY_TOOL,
  REPOSITORY_TOOL_CATALOG,
  VIEW_FILE_TOOL,
  VIEW_FOLDER_TOOL,
} from "./RepositoryToolCatalog.js";

export interface ContentSummarizer {
  summarize(content: string, signal?: AbortSignal): Promise<string>;
}

export interface ViewedFileListener {
  notify(filePath: string): void;
}

export interface RepositoryToolDependencies {
  content: RepositoryContentSource;
  summarizer: ContentSummarizer;
  viewedFiles?: ViewedFileListener;
}

const bind = (descriptor: ToolDescriptor, handler: ToolHandler): ToolDefinition => ({
  name: descriptor.name,
  description: descriptor.description,
  inputSchema: descriptor.inputSchema,
  handler,
});

export const createRepositoryTools = (deps: RepositoryToolDependencies): ToolDefinition[] => {
  const handlers: Record<string, ToolHandler> = {
    [VIEW_FILE_TOOL]: async (args, context) => {
      const filePath = args.path;
      const output = await deps.content.getFile(context.repository.owner, context.repository.name, filePath, {
        ref: context.ref,
        signal: context.signal,
      });
      deps.viewedFiles?.notify(filePath);
      return { output, data: { path: filePath } };
    },
    [VIEW_FOLDER_TOOL]: async (args, context) => {
      const output = await deps.content.getFolder(
        context.repository.owner,
        context.repository.name,
        args.path,
        { ref: context.ref, signal: context.signal },
      );
      return { output, data: { path: args.path } };
    },
    [GENERATE_SUMMARY_TOOL]: async (args, context) => ({
      output: await deps.summarizer.summarize(args.content, context.signal),
    }),
  };

  return REPOSITORY_TOOL_CATALOG.map((descriptor) => {
    const handler = handlers[descriptor.name];
    if (!handler) {
      throw new Error(`No handler bound for tool: ${descriptor.name}`);
    }
    return bind(descriptor, handler);
  });
};
