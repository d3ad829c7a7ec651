/**
 * Server entry point: environment configuration, logging, the file-backed
 * catalogue, the card service and the SVG sanitizer, on top of everything
 * the engine entry point exports. Importing it validates the environment.
 */

export * from '../index';

export { config } from './config';
export type { AppConfig } from './config';
export { logger } from './utils/logger';
export { sanitizeSvg, MAX_SVG_BYTES } from './render/svgSanitizer';
export { FileCatalogueProvider, parseCatalogue } from './catalogue/FileCatalogueProvider';
export { ScenarioCardService, createScenarioCardService } from './services/ScenarioCardService';
export type { ScenarioCardServiceOptions } from './services/ScenarioCardService';
