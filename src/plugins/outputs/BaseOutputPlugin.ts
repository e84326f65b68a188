import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../core/Logger';
import { FileWriteError, errorMessage } from '../../core/errors';
import type { OutputPlugin, PluginMetadata } from '../../types/plugin.types';
import type { GeoRecord } from '../../types/geo.types';
import { ok, err, Result } from '../../types/result.types';

/**
 * Abstract base class for file output plugins.
 * Subclasses provide the serialization; directory creation and the file
 * handle lifecycle live here.
 */
export abstract class BaseOutputPlugin implements OutputPlugin {
  protected logger = createLogger(this.constructor.name);

  abstract readonly metadata: PluginMetadata;

  abstract readonly defaultFilename: string;

  abstract serialize(record: GeoRecord): string;

  /**
   * Write the record to disk, creating parent directories as needed.
   * The content is serialized before the file is opened, so a failure
   * never truncates an existing file it could not replace.
   */
  async write(
    record: GeoRecord,
    filePath: string = this.defaultFilename
  ): Promise<Result<string, FileWriteError>> {
    const target = path.resolve(filePath);

    try {
      const content = this.serialize(record);
      await fs.mkdir(path.dirname(target), { recursive: true });

      const handle = await fs.open(target, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
      } finally {
        await handle.close();
      }

      this.logger.info(`Data successfully saved to ${filePath}`);
      return ok(target);
    } catch (error) {
      const message = `Error saving ${this.metadata.name} file: ${errorMessage(error)}`;
      this.logger.error(message);
      return err(new FileWriteError(message, target, { cause: error }));
    }
  }
}
