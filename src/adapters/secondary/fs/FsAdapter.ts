import * as fs from "fs";
import {
  FileSystemPort,
  WriteMode,
} from "../../../application/ports/driven/FileSystemPort";

/**
 * Adaptador para el sistema de archivos local
 */
export class FsAdapter implements FileSystemPort {
  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  isDirectory(filePath: string): boolean {
    const stats = fs.statSync(filePath, { throwIfNoEntry: false });
    return stats?.isDirectory() ?? false;
  }

  makeDirectories(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }

  readFile(filePath: string): string {
    return fs.readFileSync(filePath, "utf-8");
  }

  writeFile(filePath: string, content: string, mode: WriteMode): void {
    if (mode === "append") {
      fs.appendFileSync(filePath, content, "utf-8");
    } else {
      fs.writeFileSync(filePath, content, "utf-8");
    }
  }
}
