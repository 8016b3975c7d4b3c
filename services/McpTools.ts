/**
 * MCP tool definitions exposed by the server. Both tools take the same
 * arguments; they differ in what they return.
 */
export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type ToolName = 'search_documents' | 'query_pdf';

function queryInputSchema(defaultMaxChunks: number, maxChunksLimit: number): McpTool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Natural-language question or keywords to look up in the PDF documents'
      },
      max_chunks: {
        type: 'integer',
        description: `Maximum number of chunks to use (default: ${defaultMaxChunks}, larger values are clamped to ${maxChunksLimit})`,
        default: defaultMaxChunks,
        minimum: 1,
        maximum: maxChunksLimit
      }
    },
    required: ['query']
  };
}

export function buildTools(defaultMaxChunks: number, maxChunksLimit: number): McpTool[] {
  return [
    {
      name: 'search_documents',
      description:
        'Hybrid keyword + semantic search over the indexed PDF documents. Returns the best matching chunks with document name, page number and a relevance score in [0,1].',
      inputSchema: queryInputSchema(defaultMaxChunks, maxChunksLimit)
    },
    {
      name: 'query_pdf',
      description:
        'Query PDF documents and get a structured answer with source citations (document name, page number, excerpt) and a confidence score.',
      inputSchema: queryInputSchema(defaultMaxChunks, maxChunksLimit)
    }
  ];
}

export function isToolName(name: string): name is ToolName {
  return name === 'search_documents' || name === 'query_pdf';
}
