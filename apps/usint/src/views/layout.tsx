import type { Child } from 'hono/jsx'
import { raw } from 'hono/html'
import type { User } from '@usint/db'

const STYLES = `
body { font-family: sans-serif; margin: 0 2em 2em; }
nav { padding: 0.6em 0; border-bottom: 1px solid #ccc; margin-bottom: 1em; }
nav a { margin-right: 1.2em; }
nav .user { float: right; color: #555; }
table { border-collapse: collapse; margin: 0.6em 0; }
th, td { border: 1px solid #bbb; padding: 0.2em 0.5em; text-align: left; vertical-align: top; }
.flash { background: #ffffcc; border: 1px solid #cc9; padding: 0.5em; margin: 0.4em 0; }
.error { color: #b00; font-weight: bold; }
.changed { background: #ffdddd; }
.warning { color: #c60; }
fieldset { margin: 1em 0; }
label { display: inline-block; min-width: 16em; }
`

interface LayoutProps {
  title: string
  user?: User | null
  flashes?: string[]
  children?: Child
}

export function Layout({ title, user, flashes = [], children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charset="utf-8" />
        <title>{title}</title>
        <style>{raw(STYLES)}</style>
      </head>
      <body>
        <nav>
          <a href="/">Usint</a>
          <a href="/ocatdatapage/">Ocat Data Page</a>
          <a href="/chkupdata/">Parameter Check</a>
          <a href="/orupdate/">Status Page</a>
          <a href="/express/">Express Approval</a>
          <a href="/rm_submission/">Remove Submission</a>
          <a href="/scheduler/">TOO Schedule</a>
          {user ? <span class="user">{user.username}</span> : null}
        </nav>
        <h1>{title}</h1>
        {flashes.map((message) => (
          <div class="flash">{message}</div>
        ))}
        {children}
      </body>
    </html>
  )
}
