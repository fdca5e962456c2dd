import { boolean, defineSchema, group, list, string, type GroupNode } from "@stratum/config"
import { assets } from "./sections/assets"
import { annotations, cache, runtimeErrors, propertyAccess, propertyInfo, secrets, serializer, uid, validation, workflows } from "./sections/components"
import { httpClient, mailer, notifier, rateLimiter } from "./sections/integrations"
import { lock } from "./sections/lock"
import { messenger } from "./sections/messenger"
import { session } from "./sections/session"
import { translator } from "./sections/translator"
import { csrfProtection, esi, exceptions, form, fragments, httpCache, profiler, request, router, ssi, webLink } from "./sections/web"

/**
 * Root `framework` tree. Built once per call; the result is frozen and may be
 * shared across processors.
 */
export function createFrameworkSchema(): GroupNode {
  return defineSchema(
    group("framework", [
      string("secret"),
      boolean("http_method_override", { default: true }),
      string("ide", { nullable: true, default: null }),
      string("default_locale", { default: "en" }),
      list("enabled_locales", string("locale")),
      boolean("set_locale_from_accept_language", { default: false }),
      boolean("set_content_language_from_locale", { default: false }),
      list("trusted_hosts", string("host")),
      list("trusted_headers", string("header"), {
        default: ["x-forwarded-for", "x-forwarded-port", "x-forwarded-proto"],
      }),
      string("error_controller", { default: "error_controller" }),
      boolean("disallow_search_engine_index", { default: true }),
      csrfProtection,
      form,
      httpCache,
      esi,
      ssi,
      fragments,
      profiler,
      workflows,
      router,
      session,
      request,
      assets,
      translator,
      validation,
      annotations,
      serializer,
      propertyAccess,
      propertyInfo,
      cache,
      runtimeErrors,
      exceptions,
      webLink,
      lock,
      messenger,
      secrets,
      notifier,
      rateLimiter,
      uid,
      httpClient,
      mailer,
    ]),
  )
}
