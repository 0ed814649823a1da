import { existsSync, readdirSync, rmSync, statSync } from 'fs'
import { join } from 'path'

/**
 * Removes every `buckets/` working directory under a reference directory.
 * A compile that crashed mid-bucket leaves these behind and nothing else
 * notices them.
 */
export function clearBucketDirectories(referenceDir: string): number {
  if (!existsSync(referenceDir))
  {
    return 0
  }

  let cleaned = 0
  for (const entry of readdirSync(referenceDir))
  {
    const bucketsDir = join(referenceDir, entry, 'buckets')
    if (!existsSync(bucketsDir) || !statSync(bucketsDir).isDirectory())
    {
      continue
    }
    try {
      rmSync(bucketsDir, { recursive: true, force: true })
      cleaned++
    }
    catch (err) {
      console.error(`Failed to remove bucket directory ${bucketsDir}:`, err)
      throw err
    }
  }

  if (cleaned > 0)
  {
    console.log(`Cleaned up ${cleaned} bucket directories in ${referenceDir}`)
  }
  return cleaned
}
