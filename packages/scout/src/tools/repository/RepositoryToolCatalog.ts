import type { ToolDescriptor } from "../ToolTypes.js";

export const VIEW_FILE_TOOL = "view_file";
export const VIEW_FOLDER_TOOL = "view_folder";
export const GENERATE_SUMMARY_TOOL = "generate_summary";

const stringParameter = (name: string, description: string): ToolDescriptor["inputSchema"] => ({
  type: "object",
  properties: {
    [name]: { type: "string", description },
  },
  required: [name],
});

const freezeDescriptor = (descriptor: ToolDescriptor): ToolDescriptor => {
  Object.freeze(descriptor.inputSchema.required);
  Object.values(descriptor.inputSchema.properties).forEach((property) => Object.freeze(property));
  Object.freeze(descriptor.inputSchema.properties);
  Object.freeze(descriptor.inputSchema);
  return Object.freeze(descriptor);
};

export const REPOSITORY_TOOL_CATALOG: readonly ToolDescriptor[] = Object.freeze([
  freezeDescriptor({
    name: VIEW_FILE_TOOL,
    description: "View the contents of a file in the repository",
    inputSchema: stringParameter("path", "The path of the file to view"),
  }),
  freezeDescriptor({
    name: VIEW_FOLDER_TOOL,
    description: "View the contents of a folder in the repository",
    inputSchema: stringParameter("path", "The path of the folder to view"),
  }),
  freezeDescriptor({
    name: GENERATE_SUMMARY_TOOL,
    description: "Generate a summary of the given content",
    inputSchema: stringParameter("content", "The content to summarize"),
  }),
]);
