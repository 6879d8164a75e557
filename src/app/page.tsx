import { siteIdentity } from '@/lib/site'

export default function Home() {
  const { blogTitle, name } = siteIdentity

  return (
    <div>
      <h1 className="text-4xl tracking-tight text-slate-900">{blogTitle}</h1>
      <p className="mt-4 text-lg text-slate-600">Notes by {name}.</p>
    </div>
  )
}
