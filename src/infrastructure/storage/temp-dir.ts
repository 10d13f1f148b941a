import { existsSync } from "node:fs"
import { tmpdir } from "node:os"

/**
 * RAM-backed scratch space when the board has it
 */
export function resolveTempDir(shm = "/dev/shm"): string {
  return existsSync(shm) ? shm : tmpdir()
}
