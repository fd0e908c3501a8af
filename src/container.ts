import type { ReasonerConfig } from './types/index.js';
import { loadConfig } from './config.js';
import { GraphReasoner } from './reasoner.js';
import { Logger, createLogger } from './utils/logger.js';

export interface ServerContainer {
    config: ReasonerConfig;
    logger: Logger;
    reasoner: GraphReasoner;
}

export function createContainer(config: ReasonerConfig = loadConfig(), logger?: Logger): ServerContainer {
    const log = logger ?? createLogger('graph-reasoner', { verbose: config.verbose });
    return {
        config,
        logger: log,
        reasoner: new GraphReasoner(config, log),
    };
}
