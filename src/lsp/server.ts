// src/lsp/server.ts
//
// Kestrel Language Server (LSP)
// -----------------------------
// Runs in its own Node.js process (stdio or IPC, picked by the client).
// It provides:
// - Diagnostics (lexer + parser + checker + safety + lint + codegen)
// - Completions (keywords, types, decorators, locals, externals)
// - Hover (types, signatures, safety classification)
// - Document symbols
//
// Analysis lives in src/language/kestrel.language.ts; this file only wires
// it to the connection and caches one result per document version.

import {
  createConnection,
  DiagnosticSeverity,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  type CompletionItem,
  type DocumentSymbol,
  type Hover,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import * as path from "path";

import { UNKNOWN_RANGE } from "../core/ast";
import { compileOptionsFromConfig, compileSource, type CompileResult } from "../language/kestrel.language";
import { loadKestrelConfig, type ResolvedKestrelConfig } from "../language/configuration";
import { Logger, type LogLevel } from "../utils/logger";
import { getCompletions } from "./completion";
import { clampRange, DIAGNOSTIC_SOURCE, toLspCompletionItem, toLspDiagnostic, toLspDocumentSymbol } from "./convert";
import { getHover } from "./hover";
import { getDocumentSymbols } from "./symbols";

/* =========================================================
   Connection & Documents
   ========================================================= */

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const log = new Logger({
  name: "kestrel-lsp",
  timestamp: false,
  sink: {
    error: (msg) => connection.console.error(msg),
    warn: (msg) => connection.console.warn(msg),
    info: (msg) => connection.console.info(msg),
    debug: (msg) => connection.console.log(msg),
  },
});

/* =========================================================
   Settings
   ========================================================= */

type ServerSettings = {
  maxNumberOfProblems: number;
  /** If true, look for kestrel.config.json above each document. */
  useProjectConfig: boolean;
  logLevel: LogLevel;
};

const DEFAULT_SETTINGS: ServerSettings = {
  maxNumberOfProblems: 200,
  useProjectConfig: true,
  logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

let globalSettings: ServerSettings = { ...DEFAULT_SETTINGS };
let hasConfigurationCapability = false;

/** Client settings arrive as untyped JSON under the `kestrel` section. */
function readSettings(raw: unknown): ServerSettings {
  if (typeof raw !== "object" || raw === null || !("kestrel" in raw)) return { ...DEFAULT_SETTINGS };
  const section: unknown = raw.kestrel;
  if (typeof section !== "object" || section === null) return { ...DEFAULT_SETTINGS };

  const out = { ...DEFAULT_SETTINGS };
  if ("maxNumberOfProblems" in section && typeof section.maxNumberOfProblems === "number") {
    out.maxNumberOfProblems = Math.max(0, Math.floor(section.maxNumberOfProblems));
  }
  if ("useProjectConfig" in section && typeof section.useProjectConfig === "boolean") {
    out.useProjectConfig = section.useProjectConfig;
  }
  if ("logLevel" in section) {
    const wanted: unknown = section.logLevel;
    const level = LOG_LEVELS.find((l) => l === wanted);
    if (level) out.logLevel = level;
  }
  return out;
}

/* =========================================================
   Cache per document
   ========================================================= */

type DocCache = {
  version: number;
  result: CompileResult;
  config: ResolvedKestrelConfig | null;
};

const cache = new Map<string, DocCache>();

/* =========================================================
   Initialize
   ========================================================= */

connection.onInitialize((params: InitializeParams): InitializeResult => {
  hasConfigurationCapability = !!params.capabilities.workspace?.configuration;

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: false,
        triggerCharacters: [".", "@"],
      },
      hoverProvider: true,
      documentSymbolProvider: true,
    },
  };
});

connection.onInitialized(() => {
  log.info("server ready", { configuration: hasConfigurationCapability });
});

/* =========================================================
   Configuration changes
   ========================================================= */

connection.onDidChangeConfiguration((change) => {
  globalSettings = hasConfigurationCapability ? readSettings(change.settings) : { ...DEFAULT_SETTINGS };
  log.setLevel(globalSettings.logLevel);

  // Settings may change diagnostics behavior.
  cache.clear();
  for (const doc of documents.all()) scheduleValidation(doc);
});

/* =========================================================
   Document lifecycle
   ========================================================= */

documents.onDidClose((e) => {
  cache.delete(e.document.uri);
  void connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
});

documents.onDidChangeContent((change) => {
  scheduleValidation(change.document);
});

function scheduleValidation(doc: TextDocument): void {
  validateTextDocument(doc).catch((err: unknown) => {
    log.error(`validation of ${doc.uri} failed: ${describe(err)}`);
  });
}

/* =========================================================
   Diagnostics pipeline
   ========================================================= */

async function validateTextDocument(doc: TextDocument): Promise<void> {
  const { result, config } = await analyzeWithCache(doc);

  if (config && (!config.diagnostics.enabled || !handlesFile(config, doc.uri))) {
    await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
    return;
  }

  const max = config ? config.diagnostics.maxProblems : globalSettings.maxNumberOfProblems;
  const diagnostics = result.diagnostics.slice(0, Math.max(0, max)).map((d) => toLspDiagnostic(d, doc));

  if (result.internalError) {
    diagnostics.push({
      severity: DiagnosticSeverity.Error,
      range: clampRange(result.internalError.range ?? UNKNOWN_RANGE, doc),
      message: `Internal compiler error: ${result.internalError.message}`,
      code: result.internalError.code,
      source: DIAGNOSTIC_SOURCE,
    });
  }

  await connection.sendDiagnostics({ uri: doc.uri, diagnostics });
}

function handlesFile(config: ResolvedKestrelConfig, uri: string): boolean {
  const ext = path.extname(uriToFsPath(uri)).toLowerCase();
  return config.files.extensions.includes(ext);
}

/* =========================================================
   Completion / hover / symbols
   ========================================================= */

connection.onCompletion(async (params): Promise<CompletionItem[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  const items = getCompletions({
    source: doc.getText(),
    offset: doc.offsetAt(params.position),
    module: result.module,
    typed: result.typed,
    maxItems: 250,
  });
  return items.map(toLspCompletionItem);
});

connection.onHover(async (params): Promise<Hover | null> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;

  const { result } = await analyzeWithCache(doc);
  const h = getHover({ module: result.module, typed: result.typed, offset: doc.offsetAt(params.position) });
  if (!h) return null;

  return {
    contents: { kind: "markdown", value: h.markdown },
    range: clampRange(h.range, doc),
  };
});

connection.onDocumentSymbol(async (params): Promise<DocumentSymbol[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  return getDocumentSymbols(result.module, result.typed).map(toLspDocumentSymbol);
});

/* =========================================================
   Core analysis + optional project config
   ========================================================= */

async function analyzeWithCache(doc: TextDocument): Promise<DocCache> {
  const existing = cache.get(doc.uri);
  if (existing && existing.version === doc.version) return existing;

  let config: ResolvedKestrelConfig | null = null;
  if (globalSettings.useProjectConfig) {
    try {
      config = await loadKestrelConfig(uriToFsPath(doc.uri));
    } catch (err) {
      // Keep defaults; the document still gets analyzed.
      log.warn(`config load failed: ${describe(err)}`);
    }
  }

  const mapped = config ? compileOptionsFromConfig(config) : { options: {}, problems: [] };
  for (const problem of [...(config?.problems ?? []), ...mapped.problems]) {
    log.logOnce("warn", `${config?.configPath ?? ""}|${problem}`, `config: ${problem}`);
  }

  const result = compileSource(doc.getText(), { ...mapped.options, logger: log });
  if (result.internalError) log.error(result.internalError.message, { uri: doc.uri });

  const entry: DocCache = { version: doc.version, result, config };
  cache.set(doc.uri, entry);
  return entry;
}

/* =========================================================
   URI / FS helpers
   ========================================================= */

function uriToFsPath(uri: string): string {
  try {
    return URI.parse(uri).fsPath;
  } catch (err) {
    log.debug(`not a file URI: ${uri} (${describe(err)})`);
    return uri;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* =========================================================
   Start listening
   ========================================================= */

documents.listen(connection);
connection.listen();
