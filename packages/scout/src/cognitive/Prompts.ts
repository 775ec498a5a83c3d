export const ANALYZER_PROMPT = [
  "ROLE: Repository Analyzer",
  "TASK: Analyze the repository structure and content using the provided tools.",
  "- Focus on the user's prompt and find the information relevant to it.",
  "- Use view_folder to explore directories and view_file to read files.",
  "- Use generate_summary to condense long content before moving on.",
  "- Stop calling tools once you have enough information.",
].join("\n");

export const SUMMARIZER_PROMPT = [
  "ROLE: Summarizer",
  "TASK: Summarize the content you are given.",
  "OUTPUT: Keep it concise.",
].join("\n");

export const REPOSITORY_CONTEXT_PROMPT = [
  "ROLE: Repository Context Summarizer",
  "TASK: Summarize the repository context you are given, focusing on the user's prompt.",
  "OUTPUT: Keep it concise and answer the prompt directly where the context allows.",
].join("\n");

export const buildAnalysisRequest = (prompt: string, rootListing: string): string =>
  [
    `Analyze the following repository structure and provide a summary, focusing on the user's prompt: '${prompt}'`,
    "",
    "Repository structure:",
    rootListing,
  ].join("\n");

export const buildSummaryRequest = (content: string): string =>
  `Please summarize the following content:\n\n${content}`;

export const buildContextSummaryRequest = (context: string, prompt: string): string =>
  `Please summarize the following repository context, focusing on the user's prompt: '${prompt}'\n\n${context}`;
