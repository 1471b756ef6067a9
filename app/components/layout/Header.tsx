import Link from 'next/link'

export default function Header() {
  return (
    <header className="bg-white border-b border-neutral-200">
      <div className="max-w-3xl mx-auto px-4 py-6">
        <Link href="/" className="flex items-end space-x-4">
          <div className="w-14 h-14 bg-primary-500 rounded-lg flex items-center justify-center">
            <svg className="w-8 h-8 text-white" fill="none" stroke="currentColor" viewBox="0 0 24 24" aria-hidden="true">
              <path
                strokeLinecap="round"
                strokeLinejoin="round"
                strokeWidth={2}
                d="M19.428 15.428a2 2 0 00-1.022-.547l-2.387-.477a6 6 0 00-3.86.517l-.318.158a6 6 0 01-3.86.517L6.05 15.21a2 2 0 00-1.806.547M8 4h8l-1 1v5.172a2 2 0 00.586 1.414l5 5c1.26 1.26.367 3.414-1.415 3.414H4.828c-1.782 0-2.674-2.154-1.414-3.414l5-5A2 2 0 009 10.172V5L8 4z"
              />
            </svg>
          </div>
          <div>
            <h1 className="text-3xl font-bold text-neutral-900">Taxonomy Tagger</h1>
            <p className="text-sm italic text-neutral-600">
              Taxonomy identification, powered by AI and Semantic Search
            </p>
          </div>
        </Link>
      </div>
    </header>
  )
}
