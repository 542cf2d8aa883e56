import type { CacheRegistry } from "@stash/cache"
import { Hono } from "hono"

/**
 * Out-of-band invalidation. Mount it behind whatever auth the application
 * already has:
 *
 * ```ts
 * app.route("/admin/cache", createCacheAdminRouter(registry))
 * ```
 */
export function createCacheAdminRouter(registry: CacheRegistry): Hono {
  const router = new Hono()

  router.post("/clear/:namespace", async (c) => {
    const namespace = c.req.param("namespace")
    const cleared = await registry.clear(namespace)

    return c.json({ namespace, cleared })
  })

  // Keys contain ":" and must be URL-encoded by the caller.
  router.delete("/keys/:key", async (c) => {
    const key = c.req.param("key")
    const deleted = await registry.clearKey(key)

    return c.json({ key, deleted })
  })

  return router
}
