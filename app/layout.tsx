'use client'
import './styles/globals.css'
import { type ReactNode, useState } from 'react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import Header from './components/layout/Header'
import Footer from './components/layout/Footer'

export default function RootLayout({ children }: { children: ReactNode }) {
  const [queryClient] = useState(
    () =>
      new QueryClient({
        defaultOptions: {
          // Searches are not idempotent enough to replay on failure.
          mutations: { retry: false },
          queries: { refetchOnWindowFocus: false },
        },
      })
  )

  return (
    <html lang="en" className="h-full">
      <head>
        <title>TaxoTagger DNA Barcode Identification</title>
        <link rel="preconnect" href="https://fonts.googleapis.com" />
        <link rel="preconnect" href="https://fonts.gstatic.com" crossOrigin="anonymous" />
        <link href="https://fonts.googleapis.com/css2?family=Inter:wght@300;400;500;600;700&display=swap" rel="stylesheet" />
      </head>
      <body className="h-full bg-neutral-50 text-neutral-900 font-sans antialiased">
        <QueryClientProvider client={queryClient}>
          <a
            href="#main"
            className="sr-only focus:not-sr-only focus:absolute focus:top-6 focus:left-6 bg-primary-500 text-white px-4 py-2 rounded-md z-50"
          >
            Skip to content
          </a>
          <div className="min-h-full flex flex-col">
            <Header />
            <main id="main" className="flex-1">
              {children}
            </main>
            <Footer />
          </div>
        </QueryClientProvider>
      </body>
    </html>
  )
}
