import type { DispatchRequest } from './request'

export const DEFAULT_METHOD_OVERRIDE_FIELD = '_method'

/**
 * Apply method override and HEAD-as-GET before dispatch
 *
 * A non-empty override field in the request body replaces the method.
 * The resulting method is returned so the finalizer can honour HEAD;
 * a HEAD request then continues through dispatch as GET.
 */
export function normalizeMethod(
  req: DispatchRequest,
  overrideField: string = DEFAULT_METHOD_OVERRIDE_FIELD
): string {
  const override = req.fields[overrideField]?.trim()
  if (override) {
    req.method = override.toUpperCase()
  }

  const originalMethod = req.method
  if (originalMethod === 'HEAD') {
    req.method = 'GET'
  }

  return originalMethod
}
