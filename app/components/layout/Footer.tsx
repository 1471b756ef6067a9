export default function Footer() {
  const currentYear = new Date().getFullYear()

  return (
    <footer className="border-t border-neutral-200 mt-auto">
      <div className="max-w-3xl mx-auto px-4 py-6 flex flex-col items-center gap-2 text-sm text-neutral-500">
        <a
          href="https://github.com/MycoAI/taxotagger"
          target="_blank"
          rel="noreferrer"
          className="underline decoration-neutral-300 hover:text-primary-600"
        >
          TaxoTagger on GitHub
        </a>
        <p>&copy; {currentYear} TaxoTagger Web</p>
      </div>
    </footer>
  )
}
