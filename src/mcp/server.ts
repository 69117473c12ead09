import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { vectorDb } from '../core/vector-db';
import { config } from '../config';
import { callTool } from './tools';

const collectionProperty = {
  type: 'string',
  description: 'Collection name',
};

const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'ask_question',
    description: 'Answer a question from one or more knowledge collections, with numbered citations',
    inputSchema: {
      type: 'object',
      properties: {
        collections: {
          type: 'array',
          items: { type: 'string' },
          description: 'Collections to search',
        },
        question: {
          type: 'string',
          description: 'The question to ask',
        },
        topKPerKnowledge: {
          type: 'number',
          description: 'Candidates retrieved from each collection (1-10)',
          default: config.rag.topKPerKnowledge,
        },
        finalTopK: {
          type: 'number',
          description: 'Documents kept after merging (1-20)',
          default: config.rag.finalTopK,
        },
        model: {
          type: 'string',
          description: 'Ollama model used for the answer',
        },
      },
      required: ['collections', 'question'],
    },
  },
  {
    name: 'embed_collection',
    description: 'Index the PDFs and CSV tables of a collection (incremental unless forceRecreate is set)',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
        forceRecreate: {
          type: 'boolean',
          description: 'Rebuild the whole index instead of adding new files',
          default: false,
        },
      },
      required: ['collection'],
    },
  },
  {
    name: 'upload_document',
    description: 'Copy a PDF into a collection, creating the collection if needed',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
        filePath: {
          type: 'string',
          description: 'Path to the PDF file to upload',
        },
      },
      required: ['collection', 'filePath'],
    },
  },
  {
    name: 'save_table',
    description: 'Save a curated table from a PDF page as a CSV file in a collection',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
        pdfFilename: { type: 'string', description: 'PDF the table was taken from' },
        page: { type: 'number', description: 'Page number (1-based)' },
        tableIndex: { type: 'number', description: 'Table number on the page (1-based)' },
        columns: { type: 'array', items: { type: 'string' } },
        rows: { type: 'array', items: { type: 'array', items: { type: 'string' } } },
        description: { type: 'string', description: 'What the table contains' },
      },
      required: ['collection', 'pdfFilename', 'page', 'tableIndex', 'columns', 'rows'],
    },
  },
  {
    name: 'save_collection_metadata',
    description: 'Create a collection or update its description',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
        description: { type: 'string', description: 'What the collection is about' },
      },
      required: ['collection'],
    },
  },
  {
    name: 'list_files',
    description: 'List the PDF and CSV files of a collection',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
      },
      required: ['collection'],
    },
  },
  {
    name: 'get_collection_metadata',
    description: 'Get the description and curated tables of a collection',
    inputSchema: {
      type: 'object',
      properties: {
        collection: collectionProperty,
      },
      required: ['collection'],
    },
  },
  {
    name: 'list_available_collections',
    description: 'List the collections that have an index and can be queried',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'list_collections',
    description: 'List all collections with file counts and index status',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'get_status',
    description: 'Get system status (Ollama, embeddings, vector DB)',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

async function main() {
  // stdout carries the protocol, so all logging goes to stderr
  console.log = console.error;
  console.info = console.error;

  try {
    console.error('Initializing MCP knowledge server...');
    config.validate();
    await vectorDb.initialize();
    console.error('MCP knowledge server initialized successfully');
  } catch (error) {
    console.error('Failed to initialize knowledge server:', error);
    process.exit(1);
  }

  const server = new Server(
    {
      name: 'knowledge-qa',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args ?? {});
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('MCP knowledge server running on stdio');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
