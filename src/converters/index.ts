import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { RenderEngineRegistry } from './base.js';
import { DrawioEngine } from './drawio.js';
import { PlantUmlEngine } from './plantuml.js';
import { splitCommandLine } from './process.js';

export * from './base.js';
export * from './drawio.js';
export * from './plantuml.js';
export * from './process.js';

export function createRenderEngines(config: AppConfig, logger: Logger): RenderEngineRegistry {
  const engines: RenderEngineRegistry = new Map();

  engines.set('drawio', new DrawioEngine(splitCommandLine(config.DRAWIO_COMMAND), logger));
  engines.set('plantuml', new PlantUmlEngine({ ...splitCommandLine(config.JAVA_COMMAND), jar: config.PLANTUML_JAR }, logger));

  return engines;
}
