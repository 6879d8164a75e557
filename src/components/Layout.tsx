import Link from 'next/link'
import clsx from 'clsx'

import { Footer } from '@/components/Footer'
import { Logo } from '@/components/Logo'
import { type SiteIdentity } from '@/lib/global-data'

export function Layout({
  identity,
  children,
}: {
  identity: SiteIdentity
  children: React.ReactNode
}) {
  return (
    <div className="flex w-full flex-col">
      <header
        className={clsx(
          'sticky top-0 z-50 flex items-center justify-between px-4 py-5 sm:px-6 lg:px-8',
          'bg-white/95 shadow-md shadow-slate-900/5',
        )}
      >
        <Link href="/" aria-label="Home page">
          <Logo
            name={identity.name}
            blogTitle={identity.blogTitle}
            className="flex items-center"
          />
        </Link>
        <span className="text-sm text-slate-500">
          {identity.name}
        </span>
      </header>
      <main className="mx-auto w-full max-w-3xl flex-auto px-4 py-16 sm:px-6 lg:px-8">
        {children}
      </main>
      <Footer name={identity.name} footerText={identity.footerText} />
    </div>
  )
}
