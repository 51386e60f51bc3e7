import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { logger } from '@pigeonpost/utils'
import { buildPrompt } from '@pigeonpost/sdk'
import { postCommand } from '../../cli/src/commands/post.js'
import { createContext } from '../../cli/src/context.js'
import { TEST_SECRETS, fakeContext } from '../helpers/context.js'
import { makePng } from '../helpers/images.js'

describe('post command', () => {
  let root: string
  let png: Buffer

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'pigeonpost-post-'))
    png = await makePng()
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(root, { recursive: true, force: true })
  })

  it('publishes an existing image under its file name', async () => {
    const file = join(root, 'soggy.png')
    writeFileSync(file, png)
    const { context, publish } = fakeContext({ env: TEST_SECRETS })

    const result = await postCommand(file, { yes: true }, context)

    expect(result).toEqual({ id: 's1', url: 'https://pigeons.example/@pigeonpost/s1' })
    expect(publish).toHaveBeenCalledWith({ adjective: 'soggy', prompt: buildPrompt('soggy'), data: png })
  })

  it('reports a missing file', async () => {
    const { context, publish } = fakeContext({ env: TEST_SECRETS })

    await expect(postCommand(join(root, 'ghost.png'), { yes: true }, context)).rejects.toMatchObject({
      code: 'FILE_NOT_FOUND',
    })
    expect(publish).not.toHaveBeenCalled()
  })

  it('refuses a file that is not an image', async () => {
    const file = join(root, 'notes.png')
    writeFileSync(file, 'not really a png')
    const { context, publish } = fakeContext({ env: TEST_SECRETS })

    await expect(postCommand(file, { yes: true }, context)).rejects.toMatchObject({ code: 'IMAGE_INVALID' })
    expect(publish).not.toHaveBeenCalled()
  })

  it('keeps a failed post at debug level', async () => {
    const file = join(root, 'soggy.png')
    writeFileSync(file, png)
    const error = vi.spyOn(logger, 'error')
    const debug = vi.spyOn(logger, 'debug')
    const { context, publish } = fakeContext({ env: TEST_SECRETS })
    publish.mockRejectedValueOnce(new Error('server down'))

    await expect(postCommand(file, { yes: true }, context)).rejects.toThrow('server down')

    expect(error).not.toHaveBeenCalled()
    expect(debug).toHaveBeenCalledWith('Post error', { error: 'server down', stack: expect.stringContaining('server down') })
  })

  it('needs Mastodon credentials', async () => {
    const file = join(root, 'soggy.png')
    writeFileSync(file, png)

    await expect(postCommand(file, { yes: true }, createContext({}))).rejects.toMatchObject({ code: 'CONFIG_MISSING' })
  })
})
