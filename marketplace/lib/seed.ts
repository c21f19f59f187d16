import { faker } from "@faker-js/faker";
import { findUserByEmail, newUser } from "./accounts";
import { hashPassword } from "./auth";
import { CATEGORIES } from "./catalog";
import { config } from "./config";
import { getStore } from "./store";
import { newId } from "./time";
import { CONDITIONS, type Product, type User } from "./types";

const DUTCH_CITIES = ["Amsterdam", "Rotterdam", "Utrecht", "Den Haag", "Eindhoven", "Groningen"];

/** Creates the configured admin account, or promotes an existing user with that email. */
export async function ensureAdmin(): Promise<{ user: User; created: boolean }> {
  const store = getStore();
  const existing = await findUserByEmail(config.adminEmail);
  if (existing) {
    if (!existing.is_admin) await store.update("users", existing.id, { is_admin: true });
    return { user: { ...existing, is_admin: true }, created: false };
  }
  const admin = newUser({
    email: config.adminEmail.toLowerCase(),
    name: "Admin",
    hashed_password: await hashPassword(config.adminPassword),
    is_admin: true
  });
  await store.create("users", { ...admin, is_verified: true });
  // eslint-disable-next-line no-console
  console.log("[seed] admin account created", admin.email);
  return { user: admin, created: true };
}

export function fakeProduct(seller: User, now: Date = new Date()): Product {
  const id = newId();
  const city = faker.helpers.arrayElement(DUTCH_CITIES);
  const address = `${faker.location.streetAddress()}, ${city}`;
  return {
    id,
    title: faker.commerce.productName(),
    description: faker.commerce.productDescription(),
    price: faker.number.int({ min: 5, max: 750 }),
    category: faker.helpers.arrayElement(CATEGORIES),
    condition: faker.helpers.arrayElement(CONDITIONS),
    images: [`https://picsum.photos/seed/${id}/400/300`],
    pickup_address: address,
    pickup_location: {
      address,
      coordinates: {
        lat: faker.location.latitude({ min: 51.4, max: 53.2, precision: 4 }),
        lng: faker.location.longitude({ min: 4.2, max: 6.9, precision: 4 })
      }
    },
    seller_id: seller.id,
    seller_name: seller.name,
    is_sold: false,
    is_featured: faker.datatype.boolean({ probability: 0.15 }),
    views: faker.number.int({ min: 0, max: 400 }),
    created_at: faker.date.recent({ days: 30, refDate: now }).toISOString()
  };
}

/** Demo sellers share one throwaway password; they exist for local browsing only. */
export async function seedDemoListings(count: number, sellerCount = 3): Promise<{ sellers: number; products: number }> {
  const store = getStore();
  const hashed_password = await hashPassword("demo-password");
  const sellers: User[] = [];
  for (let i = 0; i < sellerCount; i++) {
    const name = faker.person.fullName();
    const seller = newUser({
      email: faker.internet.email({ firstName: name.split(" ")[0], provider: "example.com" }).toLowerCase(),
      name,
      hashed_password,
      is_business_seller: i === 0,
      business_name: i === 0 ? faker.company.name() : null,
      vat_number: i === 0 ? `NL${faker.string.numeric(9)}B01` : null
    });
    sellers.push(await store.create("users", seller));
  }
  for (let i = 0; i < count; i++) {
    await store.create("products", fakeProduct(faker.helpers.arrayElement(sellers)));
  }
  // eslint-disable-next-line no-console
  console.log(`[seed] ${count} demo listings across ${sellers.length} sellers`);
  return { sellers: sellers.length, products: count };
}
