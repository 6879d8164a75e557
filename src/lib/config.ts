/**
 * Centralized configuration for site-wide constants
 * Identity values can be overridden per deployment through the env vars below
 */

export const siteConfig = {
  /**
   * Fallback identity, used when the matching env var is unset or empty
   */
  defaults: {
    name: 'PowctoRhan',
    blogTitle: 'Learing Notes',
    footerText: 'DRIVEN BY PASSION',
  },

  /**
   * Env var read for each identity field (values are percent-decoded)
   */
  envVars: {
    name: 'BLOG_NAME',
    blogTitle: 'BLOG_TITLE',
    footerText: 'BLOG_FOOTER_TEXT',
  },

  logPrefix: '[site-identity]',
} as const

export type IdentityField = keyof typeof siteConfig.defaults
