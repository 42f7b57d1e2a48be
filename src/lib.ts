/**
 * go-annotate - Library Entry Point
 *
 * Exports annotation closure and classification for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Ontology
export { TermGraph } from './ontology/termGraph.js';
export type { ClosureContext } from './ontology/termGraph.js';
export { HierarchyLoader } from './ontology/loader.js';
export type { LoadContext } from './ontology/loader.js';
export { FileTermStore } from './ontology/termStore.js';
export type { TermStore } from './ontology/termStore.js';

// Annotation
export { AnnotationResolver, PER_PROTEIN_ERRORS } from './annotation/resolver.js';
export type { ResolverOptions } from './annotation/resolver.js';
export { AnnotationService, formatAnnotation } from './annotation/service.js';
export type { ClassifyOptions } from './annotation/service.js';

// Classification
export {
    canonicalRules,
    classify,
    classifyAll,
    matchesRule,
    validateRules,
    findCoverageOverlaps,
} from './classification/engine.js';
export {
    defineRule,
    parseRuleSet,
    parseRuleSetText,
    toRuleDefinition,
    loadDefaultRules,
} from './classification/rules.js';

// Annotation source
export { QuickGoClient } from './quickgo/client.js';
export type { QuickGoClientOptions } from './quickgo/client.js';

// Tables
export {
    parseTable,
    extractColumn,
    readProteinIds,
    formatTable,
    writeTable,
    resolveDelimiter,
} from './io/table.js';
export { OUTPUT_COLUMNS, toAnnotationRecord, toClassificationRecord } from './io/rows.js';

// Utilities
export { simplifyName, displayName } from './utils/naming.js';

// Types and Interfaces
export * from './types/index.js';

// Wiring
export { createContainer } from './container.js';
export type { AnnotationContainer, ContainerOptions } from './container.js';
export { readConfig } from './config.js';
export type { RuntimeConfig } from './config.js';
export { VERSION } from './version.js';
