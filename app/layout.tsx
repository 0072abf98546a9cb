import React from "react"
import type { Metadata } from 'next'

export const metadata: Metadata = {
  title: 'Foodgram',
  description: 'Recipes, favorites and shopping lists.',
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="en">
      <body style={{ fontFamily: 'system-ui, sans-serif', margin: '0 auto', maxWidth: 960, padding: 24 }}>
        <header>
          <a href="/" style={{ fontWeight: 700, fontSize: 24, textDecoration: 'none', color: 'inherit' }}>
            Foodgram
          </a>
        </header>
        <main>{children}</main>
      </body>
    </html>
  )
}
