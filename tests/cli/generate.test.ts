import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { logger } from '@pigeonpost/utils'
import { buildPrompt } from '@pigeonpost/sdk'
import { generateCommand } from '../../cli/src/commands/generate.js'
import { createContext } from '../../cli/src/context.js'
import { fakeContext } from '../helpers/context.js'
import { makePng } from '../helpers/images.js'

describe('generate command', () => {
  let root: string
  let png: Buffer

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'pigeonpost-generate-'))
    png = await makePng()
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(root, { recursive: true, force: true })
  })

  it('saves the image in the configured output directory', async () => {
    const { context, generate } = fakeContext({ env: { PIGEONPOST_OUTPUT_DIR: root }, image: png })

    const result = await generateCommand({ adjective: 'soggy' }, context)

    expect(result.filepath).toBe(join(root, 'soggy.png'))
    expect(generate).toHaveBeenCalledWith(buildPrompt('soggy'))
    expect(readFileSync(join(root, 'soggy.png')).equals(png)).toBe(true)
  })

  it('prefers --output over the configured directory', async () => {
    const output = join(root, 'elsewhere')
    const { context } = fakeContext({ env: { PIGEONPOST_OUTPUT_DIR: root }, image: png })

    const result = await generateCommand({ adjective: 'soggy', output }, context)

    expect(result.filepath).toBe(join(output, 'soggy.png'))
  })

  it('publishes when --post is given', async () => {
    const { context, publish } = fakeContext({ env: { PIGEONPOST_OUTPUT_DIR: root }, image: png })

    const result = await generateCommand({ adjective: 'soggy', post: true }, context)

    expect(result.status?.url).toBe('https://pigeons.example/@pigeonpost/s1')
    expect(publish).toHaveBeenCalledWith({ adjective: 'soggy', prompt: buildPrompt('soggy'), data: png })
  })

  it('builds no clients on a dry run', async () => {
    const { context, imageGenerator, publisher } = fakeContext({ env: { PIGEONPOST_OUTPUT_DIR: root } })

    const result = await generateCommand({ adjective: 'soggy', dryRun: true, post: true }, context)

    expect(result).toEqual({ adjective: 'soggy', prompt: buildPrompt('soggy') })
    expect(imageGenerator).not.toHaveBeenCalled()
    expect(publisher).not.toHaveBeenCalled()
    expect(existsSync(join(root, 'soggy.png'))).toBe(false)
  })

  it('leaves failure output to the entry point and keeps the stack at debug level', async () => {
    const error = vi.spyOn(logger, 'error')
    const debug = vi.spyOn(logger, 'debug')
    const { context } = fakeContext({ env: { PIGEONPOST_OUTPUT_DIR: root }, image: Buffer.from('garbage') })

    await expect(generateCommand({ adjective: 'soggy' }, context)).rejects.toMatchObject({ code: 'IMAGE_INVALID' })

    expect(error).not.toHaveBeenCalled()
    expect(debug).toHaveBeenCalledWith('Generate error', {
      error: expect.stringMatching(/^\[IMAGE_INVALID\] Could not read image \(7 bytes\)/),
      stack: expect.stringContaining('Could not read image'),
    })
  })

  it('fails fast without an OpenAI key', async () => {
    const context = createContext({ PIGEONPOST_OUTPUT_DIR: root })

    await expect(generateCommand({}, context)).rejects.toMatchObject({
      code: 'CONFIG_MISSING',
      message: 'Missing environment variables: OPENAI_API_KEY',
    })
  })

  it('fails fast when posting without Mastodon credentials', async () => {
    const context = createContext({ PIGEONPOST_OUTPUT_DIR: root, OPENAI_API_KEY: 'test-openai-key' })

    await expect(generateCommand({ post: true }, context)).rejects.toMatchObject({
      code: 'CONFIG_MISSING',
      details: { missing: ['MASTODON_CLIENT_KEY', 'MASTODON_CLIENT_SECRET', 'MASTODON_ACCESS_TOKEN'] },
    })
  })
})
