import * as path from "path";
import {
  createConnection,
  FileChangeType,
  InitializeParams,
  InitializeResult,
  ProposedFeatures,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";
import { AnalysisEngine, type FileChange } from "./analysis/engine";
import {
  defaultConfig,
  readConfigFile,
  resolveConfig,
  type EnvlensConfig,
} from "./config";
import { DotenvValueSource } from "./env/dotenvSource";
import { GuardedValueResolver } from "./env/guarded";
import type { ValueResolver } from "./env/valueSource";
import { normalizeUri, uriToPath } from "./files";
import { COMMANDS, executeCommand } from "./handlers/commands";
import { provideCompletion } from "./handlers/completion";
import type { HandlerContext } from "./handlers/context";
import { provideDefinition } from "./handlers/definition";
import { computeDiagnostics } from "./handlers/diagnostics";
import { provideHover } from "./handlers/hover";
import { provideInlayHints } from "./handlers/inlayHints";
import { provideReferences } from "./handlers/references";
import { prepareRename, provideRename } from "./handlers/rename";
import { provideWorkspaceSymbols } from "./handlers/workspaceSymbols";
import { createLogger, describeError, type Logger } from "./logger";

const connection = createConnection(ProposedFeatures.all);
let logger: Logger = createLogger(connection.console, "info");
let config: EnvlensConfig = defaultConfig();
let engine: AnalysisEngine | undefined;
let values: ValueResolver | undefined;
let workspaceRoots: string[] = [];

// Track in-flight validations so we can abort stale ones
const inFlightValidations = new Map<string, AbortController>();

function context(): HandlerContext | undefined {
  if (!engine || !values) return undefined;
  return { engine, values, config, logger };
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
  workspaceRoots = resolveWorkspaceRoots(params);
  config = resolveConfig(
    {
      initializationOptions: params.initializationOptions,
      fileConfig: readConfigFile(workspaceRoots, logger),
      env: process.env,
    },
    logger,
  );
  logger = createLogger(connection.console, config.logLevel);

  engine = new AnalysisEngine({
    roots: workspaceRoots,
    grammarDir: config.grammarDir,
    logger,
  });
  values = new GuardedValueResolver(
    new DotenvValueSource(
      {
        roots: workspaceRoots,
        envFiles: config.workspace.envFiles,
        useProcessEnv: config.workspace.useProcessEnv,
      },
      logger,
    ),
    logger,
  );
  engine.documents.onDidAnalyze((snapshot) => {
    void validateDocument(snapshot.uri);
  });

  const triggers = [
    ...new Set(engine.registry.all().flatMap((profile) => profile.completionTriggers)),
  ];

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: config.features.hover,
      completionProvider: config.features.completion
        ? { resolveProvider: false, triggerCharacters: triggers }
        : undefined,
      definitionProvider: config.features.definition,
      referencesProvider: config.features.references,
      renameProvider: config.features.rename ? { prepareProvider: true } : false,
      inlayHintProvider: config.features.inlayHints,
      workspaceSymbolProvider: config.features.workspaceSymbols,
      executeCommandProvider: { commands: COMMANDS },
    },
  };
});

connection.onInitialized(async () => {
  connection.console.info("envlens language server initialized.");
  if (!engine || !values) return;
  const activeEngine = engine;

  await values.refresh();

  if (workspaceRoots.length === 0) {
    logger.info("No workspace folder; cross-module resolution limited to open files.");
    return;
  }
  const handle = activeEngine.tasks.spawn("workspace-index", (token) =>
    activeEngine.indexWorkspace(
      {
        include: config.workspace.include,
        exclude: config.workspace.exclude,
        concurrency: config.indexing.concurrency,
      },
      token,
    ),
  );
  try {
    await handle.promise;
    revalidateOpenDocuments();
  } catch (err) {
    logger.warn(`Workspace indexing stopped: ${describeError(err)}`);
  }
});

connection.onDidOpenTextDocument((params) => {
  const { uri, languageId, version, text } = params.textDocument;
  void engine?.open(uri, languageId, version, text);
});

connection.onDidChangeTextDocument((params) => {
  engine?.change(
    params.textDocument.uri,
    params.textDocument.version,
    params.contentChanges,
  );
});

connection.onDidCloseTextDocument((params) => {
  const normalizedUri = normalizeUri(params.textDocument.uri);
  engine?.close(params.textDocument.uri);
  // Abort any in-flight validation so stale results aren't published after close
  const inFlight = inFlightValidations.get(normalizedUri);
  if (inFlight) {
    inFlight.abort();
    inFlightValidations.delete(normalizedUri);
  }
  connection.sendDiagnostics({ uri: params.textDocument.uri, diagnostics: [] });
});

connection.onDidChangeWatchedFiles(async (params) => {
  if (!engine || !values) return;
  let envChanged = false;
  const changes: FileChange[] = [];
  for (const change of params.changes) {
    const filePath = uriToPath(change.uri);
    if (filePath && config.workspace.envFiles.includes(path.basename(filePath))) {
      envChanged = true;
      continue;
    }
    if (engine.documents.has(change.uri)) continue;
    changes.push({ uri: change.uri, deleted: change.type === FileChangeType.Deleted });
  }
  if (envChanged) await values.refresh();
  if (changes.length > 0) {
    try {
      await engine.reindexFiles(changes).promise;
    } catch (err) {
      logger.warn(`Re-indexing stopped: ${describeError(err)}`);
      return;
    }
  }
  revalidateOpenDocuments();
});

connection.onHover(async (params) => {
  const ctx = context();
  if (!ctx) return null;
  await ctx.engine.flush(params.textDocument.uri);
  return provideHover(ctx, params.textDocument.uri, params.position);
});

connection.onDefinition(async (params) => {
  const ctx = context();
  if (!ctx) return [];
  await ctx.engine.flush(params.textDocument.uri);
  return provideDefinition(ctx, params.textDocument.uri, params.position);
});

connection.onReferences(async (params) => {
  const ctx = context();
  if (!ctx) return [];
  await ctx.engine.flush();
  return provideReferences(
    ctx,
    params.textDocument.uri,
    params.position,
    params.context.includeDeclaration,
  );
});

connection.onPrepareRename(async (params) => {
  const ctx = context();
  if (!ctx) return null;
  await ctx.engine.flush(params.textDocument.uri);
  return prepareRename(ctx, params.textDocument.uri, params.position);
});

connection.onRenameRequest(async (params) => {
  const ctx = context();
  if (!ctx) return null;
  await ctx.engine.flush();
  return provideRename(ctx, params.textDocument.uri, params.position, params.newName);
});

connection.onCompletion(async (params) => {
  const ctx = context();
  if (!ctx) return [];
  return provideCompletion(ctx, params.textDocument.uri, params.position);
});

connection.languages.inlayHint.on(async (params) => {
  const ctx = context();
  if (!ctx) return [];
  await ctx.engine.flush(params.textDocument.uri);
  return provideInlayHints(ctx, params.textDocument.uri, params.range);
});

connection.onWorkspaceSymbol(async (params) => {
  const ctx = context();
  if (!ctx) return [];
  return provideWorkspaceSymbols(ctx, params.query);
});

connection.onExecuteCommand(async (params) => {
  const ctx = context();
  if (!ctx) return null;
  return executeCommand(ctx, params.command, params.arguments ?? []);
});

connection.onShutdown(async () => {
  for (const controller of inFlightValidations.values()) {
    controller.abort();
  }
  inFlightValidations.clear();
  await engine?.shutdown();
});

function revalidateOpenDocuments(): void {
  for (const snapshot of engine?.documents.all() ?? []) {
    void validateDocument(snapshot.uri);
  }
}

async function validateDocument(uri: string): Promise<void> {
  const ctx = context();
  const snapshot = ctx?.engine.get(uri);
  if (!ctx || !snapshot) return;
  if (!ctx.config.features.diagnostics) {
    connection.sendDiagnostics({ uri, diagnostics: [] });
    return;
  }

  // Abort any in-flight validation for this document
  const previous = inFlightValidations.get(uri);
  if (previous) {
    previous.abort();
  }
  const abortController = new AbortController();
  inFlightValidations.set(uri, abortController);

  try {
    const diagnostics = await computeDiagnostics(
      uri,
      ctx.engine.references(uri),
      ctx.values,
    );
    if (abortController.signal.aborted) {
      return;
    }
    // Drop stale results if the document has been re-analysed since we started
    const current = ctx.engine.get(uri);
    if (!current || current.generation !== snapshot.generation) {
      return;
    }
    connection.sendDiagnostics({ uri, version: snapshot.version, diagnostics });
  } catch (error) {
    if (abortController.signal.aborted) {
      return;
    }
    logger.error(`Diagnostics failed: ${describeError(error)}`);
    connection.sendDiagnostics({ uri, diagnostics: [] });
  } finally {
    if (inFlightValidations.get(uri) === abortController) {
      inFlightValidations.delete(uri);
    }
  }
}

function resolveWorkspaceRoots(params: InitializeParams): string[] {
  const roots: string[] = [];
  if (Array.isArray(params.workspaceFolders)) {
    for (const folder of params.workspaceFolders) {
      const folderPath = uriToPath(folder.uri);
      if (folderPath) roots.push(path.resolve(folderPath));
    }
  }
  if (roots.length === 0 && params.rootUri) {
    const rootPath = uriToPath(params.rootUri);
    if (rootPath) roots.push(path.resolve(rootPath));
  }
  return roots;
}

connection.listen();
