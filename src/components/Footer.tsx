export function Footer({
  name,
  footerText,
  year = new Date().getFullYear(),
}: {
  name: string
  footerText: string
  year?: number
}) {
  return (
    <footer className="border-t border-slate-200 py-8 text-center text-sm text-slate-500">
      <p className="font-semibold tracking-widest">{footerText}</p>
      <p className="mt-2">
        &copy; {year} {name}
      </p>
    </footer>
  )
}
