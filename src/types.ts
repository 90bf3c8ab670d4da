/**
 * projmap Type Definitions
 * Structural project index, call graph and backup log
 */

// =============================================================================
// SYMBOL RECORDS
// =============================================================================

/**
 * A function or method known only by its signature
 */
export interface SignatureOnly {
  kind: 'signature';
  signature: string;
}

/**
 * A function or method carrying call-graph edges.
 * `calls` comes verbatim from the extractor (lexical matches, not resolved
 * symbols); `called_by` is derived by the call graph builder.
 */
export interface SignatureWithCallGraph {
  kind: 'call-graph';
  signature: string;
  calls?: string[];
  called_by?: string[];
}

export type SymbolRecord = SignatureOnly | SignatureWithCallGraph;

/**
 * Class record - methods keyed by bare method name
 */
export interface ClassRecord {
  methods: Record<string, SymbolRecord>;
  extends?: string;
}

// =============================================================================
// FILE RECORDS
// =============================================================================

export interface FileRecord {
  language: string;
  parsed: boolean;            // Did a language extractor yield symbols?
  purpose?: string;
  functions?: Record<string, SymbolRecord>;
  classes?: Record<string, ClassRecord>;
  imports?: string[];         // Raw import strings, as written in source
}

/**
 * Output of a language extractor for a single file
 */
export interface ExtractionResult {
  functions: Record<string, SymbolRecord>;
  classes: Record<string, ClassRecord>;
  imports: string[];
}

/**
 * Section headers and architecture hints from a markdown file
 */
export interface DocumentationEntry {
  sections: string[];
  architecture_hints: string[];
}

// =============================================================================
// PROJECT INDEX (SNAPSHOT)
// =============================================================================

/**
 * File path -> resolved targets (project paths or external module ids)
 */
export type DependencyGraph = Record<string, string[]>;

/**
 * Forward call edges keyed `path:function` or `path:Class.method`
 */
export type CallGraph = Record<string, string[]>;

export interface IndexStats {
  total_files: number;
  total_directories: number;
  fully_parsed: Record<string, number>;   // parser key -> file count
  listed_only: Record<string, number>;    // language -> file count
  markdown_files: number;
}

export interface ProjectStructure {
  type: 'tree';
  root: '.';
  tree: string[];
}

/**
 * The complete structural index for one run
 */
export interface ProjectIndex {
  indexed_at: string;                       // ISO timestamp
  root: string;
  project_structure: ProjectStructure;
  documentation_map: Record<string, DocumentationEntry>;
  directory_purposes: Record<string, string>;
  stats: IndexStats;
  files: Record<string, FileRecord>;
  dependency_graph: DependencyGraph;
  staleness_check: number;                  // Epoch seconds, now minus 7 days
}

// =============================================================================
// PERSISTED FORM
// =============================================================================

/**
 * On disk, signature-only symbols are bare strings and call-graph symbols
 * are objects without the `kind` tag.
 */
export type SerializedSymbol =
  | string
  | { signature: string; calls?: string[]; called_by?: string[] };

export interface SerializedClass {
  methods: Record<string, SerializedSymbol>;
  extends?: string;
}

export interface SerializedFileRecord {
  language: string;
  parsed: boolean;
  purpose?: string;
  functions?: Record<string, SerializedSymbol>;
  classes?: Record<string, SerializedClass>;
  imports?: string[];
}

export interface SerializedIndex extends Omit<ProjectIndex, 'files'> {
  files: Record<string, SerializedFileRecord>;
}

/**
 * The parts of a previous snapshot the change analyzer needs
 */
export interface PriorIndex {
  stats: IndexStats;
  files: Record<string, { functionCount: number; classCount: number }>;
}

// =============================================================================
// CHANGE ANALYSIS
// =============================================================================

export type SignificanceLevel =
  | 'auto_approved'
  | 'requires_confirmation'
  | 'pending'
  | 'unknown';

export interface FileLevelChanges {
  files_added: string[];
  files_removed: string[];
  files_modified: string[];
}

export interface ChangeData {
  old_stats: IndexStats | null;
  new_stats: IndexStats | null;
  file_changes: FileLevelChanges;
  significance_level: SignificanceLevel;
  notes: string;
}

export interface ChangeAnalysis {
  significant: boolean;
  reasons: string[];
  fileChange: number;
  dirChange: number;
  changeData: ChangeData;
}

// =============================================================================
// BACKUPS
// =============================================================================

export interface BackupInfo {
  path: string;
  filename: string;
  sizeBytes: number;
}

export interface BackupEntry {
  timestamp: string;
  backup_filename: string | null;
  backup_size_bytes: number;
  previous_stats: IndexStats | null;
  new_stats: IndexStats | null;
  changes: {
    files_added: number;
    files_removed: number;
    files_modified: number;
    directories_added: number;
  };
  file_changes: FileLevelChanges;
  significance_level: SignificanceLevel;
  notes: string;
  operation_success: boolean;
}

export interface BackupLog {
  log_version: '1.0';
  created_at: string;
  project_path: string;
  description: string;
  max_backups: number;
  entries: BackupEntry[];
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ProjmapConfig {
  outputFile: string;         // Snapshot filename, relative to the project root
  backupDir: string;          // Backup directory, relative to the project root
  maxBackups: number;
  maxLogEntries: number;
  maxIndexSize: number;       // Bytes of pretty-printed JSON
  maxFiles: number;
  maxTreeDepth: number;
  verbose: boolean;
}
