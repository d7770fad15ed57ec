import path from 'node:path'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { ContentBlock, ImageFormat } from '../gateway/types.js'
import type { Logger } from '../logger/index.js'

const FORMATS: Record<string, ImageFormat> = {
    png: 'png',
    jpeg: 'jpeg',
    jpg: 'jpeg',
    gif: 'gif',
    webp: 'webp',
}

export function imageFormatFor(filePath: string): ImageFormat {
    const ext = path.extname(filePath).slice(1).toLowerCase()
    return FORMATS[ext] ?? 'png'
}

export type ImageBlock = Extract<ContentBlock, { kind: 'image' }>

/**
 * Reads screenshots into image blocks. Missing or unreadable files are logged and left out.
 */
export async function loadImages(paths: readonly string[], fs: FileSystem, logger: Logger): Promise<ImageBlock[]> {
    const blocks: ImageBlock[] = []
    for (const filePath of paths) {
        if (!(await fs.exists(filePath))) {
            logger.warn({ path: filePath }, 'Screenshot not found, skipping')
            continue
        }
        try {
            const bytes = await fs.readBytes(filePath)
            blocks.push({ kind: 'image', format: imageFormatFor(filePath), bytes })
            logger.debug({ path: filePath, size: bytes.byteLength }, 'screenshot:loaded')
        } catch (error) {
            logger.warn({ path: filePath, err: errorMessage(error) }, 'Could not read screenshot, skipping')
        }
    }
    return blocks
}
