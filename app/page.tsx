import Link from 'next/link';
import { getDb } from '@/lib/db';

export const dynamic = 'force-dynamic';

const PAGE_SIZE = 12;

export default async function HomePage() {
  const db = getDb();
  const recipes = await db.listRecipes({}, { limit: PAGE_SIZE, offset: 0 });
  const authors = new Map(
    (await db.getUsersByIds([...new Set(recipes.map((r) => r.author_id))])).map((u) => [u.id, u])
  );

  if (recipes.length === 0) {
    return <p>No recipes yet.</p>;
  }

  return (
    <ul style={{ listStyle: 'none', padding: 0, display: 'grid', gap: 24, gridTemplateColumns: 'repeat(auto-fill, minmax(260px, 1fr))' }}>
      {recipes.map((recipe) => {
        const author = authors.get(recipe.author_id);
        return (
          <li key={recipe.id}>
            <Link href={`/recipes/${recipe.id}/`}>
              {/* eslint-disable-next-line @next/next/no-img-element */}
              <img src={`/media/${recipe.image}`} alt={recipe.name} style={{ width: '100%', aspectRatio: '4 / 3', objectFit: 'cover' }} />
              <h2 style={{ fontSize: 18 }}>{recipe.name}</h2>
            </Link>
            <p>
              {recipe.cooking_time} min
              {author ? ` · ${author.first_name} ${author.last_name}` : ''}
            </p>
          </li>
        );
      })}
    </ul>
  );
}
