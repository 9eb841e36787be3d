import type { Dict, TranslateFn, TranslateParams } from './context'

export type TranslateWithFallbackFn = (key: string, fallback?: string, params?: TranslateParams) => string

function format(template: string, params?: TranslateParams) {
  if (!params) return template
  return template.replace(/\{\{(\w+)\}\}|\{(\w+)\}/g, (match, doubleKey?: string, singleKey?: string) => {
    const key = doubleKey ?? singleKey
    if (!key) return match
    const value = params[key]
    if (value === undefined) return match
    return String(value)
  })
}

export function createTranslator(dict: Dict): TranslateFn {
  return (key, fallbackOrParams, params) => {
    let fallback: string | undefined
    let resolvedParams: TranslateParams | undefined

    if (typeof fallbackOrParams === 'string') {
      fallback = fallbackOrParams
      resolvedParams = params
    } else {
      resolvedParams = fallbackOrParams
    }

    const template = dict[key] ?? fallback ?? key
    return format(template, resolvedParams)
  }
}

export function createFallbackTranslator(dict: Dict = {}): TranslateWithFallbackFn {
  const t = createTranslator(dict)
  return (key, fallback, params) => t(key, fallback ?? key, params)
}
