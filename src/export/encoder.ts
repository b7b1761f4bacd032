import sharp from "sharp";
import { writeFile } from "fs/promises";
import { createLogger } from "../logger";
import type { ImageEncoder } from "../metadata/types";

const log = createLogger("encoder");

export class SharpEncoder implements ImageEncoder {
  name = "sharp";

  async reencode(sourcePath: string, destinationPath: string, quality: number): Promise<void> {
    log.debug({ sourcePath, destinationPath, quality }, "Re-encoding image");

    const pipeline = sharp(sourcePath).withMetadata().jpeg({ quality });
    if (sourcePath === destinationPath) {
      // Input is fully decoded before the file is replaced
      const buffer = await pipeline.toBuffer();
      await writeFile(destinationPath, buffer);
      return;
    }
    await pipeline.toFile(destinationPath);
  }
}
