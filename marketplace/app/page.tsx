import { CATEGORIES } from "@/lib/catalog";
import { config } from "@/lib/config";

export default function HomePage() {
  return (
    <main style={{ fontFamily: "system-ui, sans-serif", maxWidth: 640, margin: "48px auto" }}>
      <h1>{config.appName} API</h1>
      <p>
        The storefront lives at <a href={config.frontendUrl}>{config.frontendUrl}</a>. This service only answers
        under <code>/api</code>.
      </p>
      <p>
        Health: <a href="/api/health">/api/health</a>
      </p>
      <h2>Categories</h2>
      <ul>
        {CATEGORIES.map((c) => (
          <li key={c}>{c}</li>
        ))}
      </ul>
    </main>
  );
}
