import { renderToStaticMarkup } from 'react-dom/server'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

async function loadSite() {
  const layout = await import('@/app/layout')
  const page = await import('@/app/page')
  return { layout, Home: page.default }
}

describe('root layout', () => {
  beforeEach(() => {
    vi.resetModules()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('builds metadata from the decoded identity', async () => {
    vi.stubEnv('BLOG_NAME', 'Ferris')
    vi.stubEnv('BLOG_TITLE', 'My%20Notes')
    vi.stubEnv('BLOG_FOOTER_TEXT', '')

    const { layout } = await loadSite()

    expect(layout.metadata).toEqual({
      title: { template: '%s - My Notes', default: 'My Notes' },
      authors: [{ name: 'Ferris' }],
      openGraph: {
        title: 'My Notes',
        siteName: 'My Notes',
        locale: 'en_US',
        type: 'website',
      },
    })
  })

  it('buildMetadata uses the identity it is given', async () => {
    const { buildMetadata } = await import('@/lib/site')
    const metadata = buildMetadata({
      name: 'Ada',
      blogTitle: 'Borrowing',
      footerText: 'x',
    })

    expect(metadata.title).toEqual({ template: '%s - Borrowing', default: 'Borrowing' })
    expect(metadata.authors).toEqual([{ name: 'Ada' }])
  })

  it('renders the title, author and footer text on the home page', async () => {
    vi.stubEnv('BLOG_NAME', 'Ferris')
    vi.stubEnv('BLOG_TITLE', 'My%20Notes')
    vi.stubEnv('BLOG_FOOTER_TEXT', 'KEEP%20LEARNING')

    const { layout, Home } = await loadSite()
    const RootLayout = layout.default
    const markup = renderToStaticMarkup(
      <RootLayout>
        <Home />
      </RootLayout>,
    )

    expect(markup).toContain(
      '<h1 class="text-4xl tracking-tight text-slate-900">My Notes</h1>',
    )
    expect(markup).toContain(
      '<span class="ml-3 text-lg font-semibold text-slate-900">My Notes</span>',
    )
    expect(markup).toContain('<span class="text-sm text-slate-500">Ferris</span>')
    expect(markup).toContain(
      '<p class="font-semibold tracking-widest">KEEP LEARNING</p>',
    )
  })

  it('warns once for a malformed variable across metadata and rendering', async () => {
    vi.stubEnv('BLOG_NAME', '')
    vi.stubEnv('BLOG_TITLE', '')
    vi.stubEnv('BLOG_FOOTER_TEXT', '%')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const { layout, Home } = await loadSite()
    const RootLayout = layout.default
    const markup = renderToStaticMarkup(
      <RootLayout>
        <Home />
      </RootLayout>,
    )

    expect(layout.metadata.title).toEqual({
      template: '%s - Learing Notes',
      default: 'Learing Notes',
    })
    expect(markup).toContain(
      '<p class="font-semibold tracking-widest">DRIVEN BY PASSION</p>',
    )
    expect(warn).toHaveBeenCalledTimes(1)
  })
})
