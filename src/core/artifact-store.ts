import path from "node:path";

import fse from "fs-extra";

import type { ResultRef } from "./task.js";
import { isInsideDir } from "./utils.js";

export interface ArtifactStore {
  save(taskId: string, audio: Uint8Array): Promise<ResultRef>;
  remove(ref: ResultRef): Promise<boolean>;
}

export const WAV_MEDIA_TYPE = "audio/wav";

// Writes one `<task id>.wav` per task under the output directory.
export class FsArtifactStore implements ArtifactStore {
  public readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  pathFor(taskId: string): string {
    return path.join(this.outputDir, `${taskId}.wav`);
  }

  async save(taskId: string, audio: Uint8Array): Promise<ResultRef> {
    const target = this.pathFor(taskId);
    this.assertInsideOutputDir(target);

    await fse.ensureDir(this.outputDir);
    const tmpPath = `${target}.partial`;
    await fse.writeFile(tmpPath, audio);
    await fse.move(tmpPath, target, { overwrite: true });

    return { path: target, size_bytes: audio.byteLength, media_type: WAV_MEDIA_TYPE };
  }

  async remove(ref: ResultRef): Promise<boolean> {
    this.assertInsideOutputDir(ref.path);
    if (!(await fse.pathExists(ref.path))) {
      return false;
    }

    await fse.remove(ref.path);
    return true;
  }

  private assertInsideOutputDir(targetPath: string): void {
    if (!isInsideDir(this.outputDir, targetPath)) {
      throw new Error(`Refusing to touch artifact outside ${this.outputDir}: ${path.resolve(targetPath)}`);
    }
  }
}
