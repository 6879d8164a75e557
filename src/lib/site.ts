import { type Metadata } from 'next'

import { getGlobalData, type SiteIdentity } from '@/lib/global-data'

// Resolved once per server process; metadata, layout and pages share it
export const siteIdentity: SiteIdentity = getGlobalData()

export function buildMetadata({ name, blogTitle }: SiteIdentity): Metadata {
  return {
    title: {
      template: `%s - ${blogTitle}`,
      default: blogTitle,
    },
    authors: [{ name }],
    openGraph: {
      title: blogTitle,
      siteName: blogTitle,
      locale: 'en_US',
      type: 'website',
    },
  }
}
