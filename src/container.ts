import type { AnnotationSource } from './types/source.js';
import type { RuleSet } from './types/rules.js';
import type { ServiceOptions } from './types/options.js';
import { TermGraph } from './ontology/termGraph.js';
import { AnnotationResolver } from './annotation/resolver.js';
import { AnnotationService } from './annotation/service.js';
import { QuickGoClient } from './quickgo/client.js';
import { loadDefaultRules } from './classification/rules.js';
import type { RuntimeConfig } from './config.js';
import { readConfig } from './config.js';

export interface AnnotationContainer {
    config: RuntimeConfig;
    graph: TermGraph;
    source: AnnotationSource;
    resolver: AnnotationResolver;
    service: AnnotationService;
    defaultRules: RuleSet;
}

export interface ContainerOptions extends ServiceOptions {
    /** Defaults to a QuickGO client configured from the environment */
    source?: AnnotationSource;
    /** Seed graph, e.g. loaded from a term store */
    graph?: TermGraph;
}

/**
 * Wire one resolution session: a term graph, the source feeding it, and
 * the resolver and service on top.
 */
export function createContainer(options: ContainerOptions = {}): AnnotationContainer {
    const config = readConfig();
    const source = options.source ?? new QuickGoClient({
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        logger: options.logger,
    });
    const graph = options.graph ?? new TermGraph();
    const resolver = new AnnotationResolver(source, { graph, logger: options.logger });
    const service = new AnnotationService(resolver, {
        ...options,
        concurrency: options.concurrency ?? config.concurrency,
    });

    return {
        config,
        graph,
        source,
        resolver,
        service,
        defaultRules: loadDefaultRules(),
    };
}
