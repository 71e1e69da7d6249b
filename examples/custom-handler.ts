/**
 * Custom error handler - replaces the default "Invalid input" diagnostic
 *
 * Run with: npx tsx examples/custom-handler.ts
 */

import "./env.js";
import { input, float, close } from "../src/index.js";

async function main() {
  const value = await input(float, "Enter a real number: ", (failure) => {
    console.error(`Input error: ${failure.reason}. Please try again.`);
  });
  console.log(`You entered: ${value}`);
}

main()
  .catch(console.error)
  .finally(close);
