/**
 * Simple Example - ask for one number
 *
 * Run with: npx tsx examples/simple.ts
 */

import "./env.js";
import { input, int, close } from "../src/index.js";

async function main() {
  const number = await input(int, "Enter a number: ");
  console.log(`You entered: ${number}`);
}

main()
  .catch(console.error)
  .finally(close);
