import { type Metadata } from 'next'

import { Layout } from '@/components/Layout'
import { buildMetadata, siteIdentity } from '@/lib/site'

import '@/styles/tailwind.css'

export const metadata: Metadata = buildMetadata(siteIdentity)

export default function RootLayout({
  children,
}: {
  children: React.ReactNode
}) {
  return (
    <html lang="en" className="h-full antialiased">
      <body className="flex min-h-full bg-white">
        <Layout identity={siteIdentity}>{children}</Layout>
      </body>
    </html>
  )
}
