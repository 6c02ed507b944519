import { Layout } from './layout.js'

export function NotFoundPage({ message }: { message?: string }) {
  return (
    <Layout title="Page Not Found">
      <p>{message ?? 'The requested page does not exist.'}</p>
      <p>
        <a href="/">Back to the index</a>
      </p>
    </Layout>
  )
}

export function ForbiddenPage({ username }: { username?: string }) {
  return (
    <Layout title="Access Denied">
      <p>
        {username
          ? `User ${username} is not registered as an active Usint user.`
          : 'No user identity was provided by the web server.'}
      </p>
    </Layout>
  )
}

export function ServerErrorPage() {
  return (
    <Layout title="Unexpected Error">
      <p>An unexpected error has occurred. The administrators have been notified.</p>
      <p>
        <a href="/">Back to the index</a>
      </p>
    </Layout>
  )
}
