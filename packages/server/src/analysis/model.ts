import type { Range } from "../range";
import type {
  ExportIndexEntry,
  ImportContext,
  Reference,
} from "../types";
import type { ExportFact } from "./extract";
import type { SymbolTable } from "./symbolTable";

/** A read the language recognises as an environment access on its own. */
export interface DirectReference {
  name: string;
  range: Range;
  nameRange: Range;
  /** Environment object the read went through, when there is one. */
  object?: string;
}

/** `object.key` or `object["key"]` where object is a plain identifier. */
export interface PropertyAccess {
  object: string;
  objectRange: Range;
  key: string;
  keyRange: Range;
  range: Range;
}

/** An identifier that is not itself a declaration. */
export interface Usage {
  name: string;
  range: Range;
}

/** The resolution-relevant state of one analysed document. */
export interface AnalysisCore {
  table: SymbolTable;
  directReferences: readonly DirectReference[];
  propertyAccesses: readonly PropertyAccess[];
  usages: readonly Usage[];
  imports: ImportContext;
}

export interface DocumentAnalysis extends AnalysisCore {
  /** Profile id, absent for documents in unsupported languages. */
  profileId?: string;
  exportFacts: readonly ExportFact[];
  /** Local references; imported ones carry no name until resolved. */
  references: readonly Reference[];
  exports: ExportIndexEntry;
}
