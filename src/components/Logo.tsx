export function initialOf(name: string) {
  const first = Array.from(name.trim())[0]
  return first ? first.toUpperCase() : '?'
}

export function Logomark({
  name,
  ...props
}: React.ComponentPropsWithoutRef<'svg'> & { name: string }) {
  return (
    <svg aria-hidden="true" viewBox="0 0 36 36" fill="none" {...props}>
      <rect x="3" y="3" width="30" height="30" rx="6" fill="#ea580c" />
      <text
        x="18"
        y="24"
        textAnchor="middle"
        fill="white"
        fontSize="20"
        fontWeight="bold"
        fontFamily="system-ui, sans-serif"
      >
        {initialOf(name)}
      </text>
    </svg>
  )
}

export function Logo({
  name,
  blogTitle,
  ...props
}: React.ComponentPropsWithoutRef<'div'> & { name: string; blogTitle: string }) {
  return (
    <div {...props}>
      <Logomark name={name} className="h-9 w-9 flex-none" />
      <span className="ml-3 text-lg font-semibold text-slate-900">
        {blogTitle}
      </span>
    </div>
  )
}
