import fs from 'fs';
import { CatalogueError } from '../../shared/errors';
import { InMemoryCatalogue } from '../../shared/engine/generation/catalogue';
import { CatalogueSchema } from '../../shared/validation/schemas';
import { config } from '../config';
import { logger } from '../utils/logger';

/**
 * Parse and validate catalogue JSON text.
 *
 * @param source label used in error context (usually the file path)
 * @throws CatalogueError when the text is not JSON or fails the schema
 */
export function parseCatalogue(text: string, source = 'inline'): InMemoryCatalogue {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogueError(`Catalogue ${source} is not valid JSON`, {
      source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = CatalogueSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new CatalogueError(
      `Catalogue ${source} is invalid: ${first ? `${first.path || 'root'}: ${first.message}` : 'unknown issue'}`,
      { source, issues }
    );
  }
  return new InMemoryCatalogue(result.data);
}

/**
 * Loads the scenario content catalogue from a JSON file on disk.
 *
 * The file is read once per {@link load} call; callers keep the returned
 * catalogue for as long as they want that content.
 */
export class FileCatalogueProvider {
  constructor(private readonly filePath: string = config.catalogue.path) {}

  get path(): string {
    return this.filePath;
  }

  load(): InMemoryCatalogue {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      throw new CatalogueError(`Catalogue file could not be read: ${this.filePath}`, {
        source: this.filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const catalogue = parseCatalogue(text, this.filePath);
    logger.info('Scenario catalogue loaded', {
      path: this.filePath,
      entries: catalogue.size(),
    });
    return catalogue;
  }
}
