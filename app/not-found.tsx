import Link from 'next/link';

export default function NotFound() {
  return (
    <div style={{ textAlign: 'center', padding: '64px 0' }}>
      <p>This page could not be found.</p>
      <Link href="/">Back to recipes</Link>
    </div>
  );
}
