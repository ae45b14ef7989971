import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { Database } from './storage/database.js';
import { resolveDbPath } from './config.js';
import {
  analyzeSnippet,
  analyzeFile,
  repoStatus,
  repoIndex,
  suggestComments,
  linkRepoReferences,
  readStringArg,
  readOptionalStringArg,
  readFlagArg,
  readOptionalStringListArg,
} from './tools/index.js';
import type { ToolArgs } from './tools/index.js';

// ---------------------------------------------------------------------------
// Tool definitions
// ---------------------------------------------------------------------------

const TOOL_DEFINITIONS = [
  {
    name: 'analyze_source',
    description:
      'Extract variable declarations (name, type, initializer, line, static/const) from C or C++ source. Pass either inline source text or a file path. Malformed code never fails; it just yields fewer declarations.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        source: {
          type: 'string',
          description: 'Source text to analyze',
        },
        file_path: {
          type: 'string',
          description: 'Path to a source file (used when source is omitted)',
        },
        include_scopes: {
          type: 'boolean',
          description: 'Also return the scope tree (global and block scopes with line ranges)',
        },
      },
    },
  },
  {
    name: 'repo_status',
    description:
      'Check if a repository has been indexed by declscan. Returns file, declaration, symbol and learned-comment counts and the last index time.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        repo_path: {
          type: 'string',
          description: 'Absolute path to repo root (use the current working directory)',
        },
      },
      required: ['repo_path'],
    },
  },
  {
    name: 'repo_index',
    description:
      'Index the C and C++ sources of a repository: declarations, class/struct/enum definitions and existing comments. Use mode=incremental after the first full index to process only changed files.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        repo_path: {
          type: 'string',
          description: 'Absolute path to repo root',
        },
        mode: {
          type: 'string',
          enum: ['full', 'incremental'],
          description: 'Indexing mode. Auto-detected if omitted (full for first run, incremental after).',
        },
        excludes: {
          type: 'array',
          items: { type: 'string' },
          description: 'Directory names to skip (default: third-party, vendor, build, scripts)',
        },
      },
      required: ['repo_path'],
    },
  },
  {
    name: 'suggest_comments',
    description:
      'Suggest one-line comments for the declarations of an indexed repository, using a term dictionary, comments learned from the repo and naming heuristics.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        repo_path: {
          type: 'string',
          description: 'Absolute path to repo root',
        },
        dictionary_path: {
          type: 'string',
          description: 'JSON file mapping terms or values to descriptions',
        },
      },
      required: ['repo_path'],
    },
  },
  {
    name: 'link_references',
    description:
      'Rewrite Markdown so mentions of indexed class, struct and enum names link to their definitions (path#Lline).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        repo_path: {
          type: 'string',
          description: 'Absolute path to repo root',
        },
        text: {
          type: 'string',
          description: 'Markdown text to link',
        },
        base_dir: {
          type: 'string',
          description: 'Directory the links are relative to (default: repo root)',
        },
      },
      required: ['repo_path', 'text'],
    },
  },
];

async function callTool(db: Database, name: string, args: ToolArgs): Promise<unknown> {
  switch (name) {
    case 'analyze_source': {
      const includeScopes = readFlagArg(args, 'include_scopes');
      const source = readOptionalStringArg(args, 'source');
      if (source !== undefined) {
        return analyzeSnippet(source, includeScopes);
      }
      const filePath = readOptionalStringArg(args, 'file_path');
      if (filePath === undefined) {
        throw new Error('Either source or file_path is required');
      }
      return analyzeFile(filePath, includeScopes);
    }

    case 'repo_status':
      return repoStatus(db, readStringArg(args, 'repo_path'));

    case 'repo_index':
      return repoIndex(
        db,
        readStringArg(args, 'repo_path'),
        readOptionalStringArg(args, 'mode'),
        readOptionalStringListArg(args, 'excludes'),
      );

    case 'suggest_comments':
      return suggestComments(
        db,
        readStringArg(args, 'repo_path'),
        readOptionalStringArg(args, 'dictionary_path'),
      );

    case 'link_references':
      return linkRepoReferences(
        db,
        readStringArg(args, 'repo_path'),
        readStringArg(args, 'text'),
        readOptionalStringArg(args, 'base_dir'),
      );

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

// ---------------------------------------------------------------------------
// startServer (exported for cli.ts)
// ---------------------------------------------------------------------------

export async function startServer(): Promise<void> {
  const dbPath = resolveDbPath();
  const db = new Database(dbPath);
  console.error(`[declscan] Using index at ${dbPath}`);

  const server = new Server(
    { name: 'declscan', version: '0.1.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await callTool(db, name, args);
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify({ error: message }),
          },
        ],
        isError: true,
      };
    }
  });

  function shutdown(): void {
    try {
      db.close();
    } catch (error) {
      console.error('[declscan] Error closing database:', error instanceof Error ? error.message : error);
    }
    process.exit(0);
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}
