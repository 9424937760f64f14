import { promises as fs } from 'fs';
import * as path from 'path';
import type { BrowserPage } from '../types/browser';
import { ensureDirExists, sanitizeSegment } from '../utils/fileutils';
import { isOk } from '../utils/result';
import { createEnhancedLogger } from '../utils/logger';

const logger = createEnhancedLogger('ErrorSnapshotter');

/**
 * ErrorSnapshotter
 *
 * Saves a screenshot, the page HTML and a short error log when a page is
 * blocked, so the block can be inspected after the run.
 */
export class ErrorSnapshotter {
  private readonly snapshotDir: string;

  constructor(
    baseDir: string = 'output/errors',
    private readonly now: () => Date = () => new Date(),
  ) {
    this.snapshotDir = path.isAbsolute(baseDir) ? baseDir : path.join(process.cwd(), baseDir);
  }

  get directory(): string {
    return this.snapshotDir;
  }

  /**
   * Captures what the page allows and returns the saved file paths. Each part
   * is independent: a failed screenshot does not prevent the HTML dump.
   */
  async capture(page: BrowserPage, reason: string, contextLabel: string = 'unknown'): Promise<string[]> {
    const timestamp = this.now().toISOString().replace(/[:.]/g, '-');
    const baseFilename = `${timestamp}_${sanitizeSegment(contextLabel)}_challenge`;
    const savedFiles: string[] = [];

    try {
      await ensureDirExists(this.snapshotDir);
    } catch (error) {
      logger.error('Cannot create snapshot directory', error instanceof Error ? error : new Error(String(error)), {
        dir: this.snapshotDir,
      });
      return savedFiles;
    }

    const screenshotPath = path.join(this.snapshotDir, `${baseFilename}.png`);
    const shot = await page.screenshot(screenshotPath);
    if (isOk(shot)) {
      savedFiles.push(screenshotPath);
    } else {
      logger.warn('Failed to capture screenshot', { kind: shot.error });
    }

    const html = await page.content();
    const htmlPath = path.join(this.snapshotDir, `${baseFilename}.html`);
    if (isOk(html)) {
      if (await this.writeFile(htmlPath, html.data)) savedFiles.push(htmlPath);
    } else {
      logger.warn('Failed to capture HTML', { kind: html.error });
    }

    const url = await page.url();
    const logPath = path.join(this.snapshotDir, `${baseFilename}.log`);
    const errorLog = [
      `Reason: ${reason}`,
      `URL: ${isOk(url) ? url.data : 'unavailable'}`,
      `Context: ${contextLabel}`,
      `Time: ${this.now().toISOString()}`,
    ].join('\n');
    if (await this.writeFile(logPath, errorLog)) savedFiles.push(logPath);

    logger.info('Challenge snapshot saved', { files: savedFiles.length, dir: this.snapshotDir });
    return savedFiles;
  }

  private async writeFile(filePath: string, content: string): Promise<boolean> {
    try {
      await fs.writeFile(filePath, content, 'utf-8');
      return true;
    } catch (error) {
      logger.error('Failed to write snapshot file', error instanceof Error ? error : new Error(String(error)), {
        path: filePath,
      });
      return false;
    }
  }
}
