import fsp from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

/**
 * A scratch directory created on first use.
 */
export class ScratchWorkspace {
  private dir: string | undefined

  constructor(
    private readonly root = os.tmpdir(),
    private readonly prefix = 'concat_norm_',
  ) {}

  get created(): boolean {
    return this.dir !== undefined
  }

  async path(): Promise<string> {
    this.dir ??= await fsp.mkdtemp(path.join(this.root, this.prefix))
    return this.dir
  }

  async remove(): Promise<void> {
    if (this.dir === undefined) return
    const dir = this.dir
    this.dir = undefined
    await fsp.rm(dir, { recursive: true, force: true })
  }
}

/**
 * Run `fn` with a scratch workspace that is removed on every exit path,
 * including failures and aborts.
 */
export async function withScratchWorkspace<T>(
  fn: (workspace: ScratchWorkspace) => Promise<T>,
  root?: string,
): Promise<T> {
  const workspace = new ScratchWorkspace(root)
  try {
    return await fn(workspace)
  } finally {
    await workspace.remove()
  }
}
