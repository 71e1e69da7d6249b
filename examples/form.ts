/**
 * Several values in one call, with a Zod schema and a custom parser
 *
 * Run with: npx tsx examples/form.ts
 * Or pipe answers: printf 'Ada\n36\nyes\nhttps://example.com\n' | npx tsx examples/form.ts
 */

import "./env.js";
import { z } from "zod";
import { record, request, string, uint, oneOf, createParser, StreamError, close } from "../src/index.js";

const url = createParser("URL", (text) => new URL(text));

const email = z.email().describe("email address");

async function main() {
  const profile = await record({
    name: request(string, "Name: "),
    age: request(uint, "Age: "),
    subscribe: request(oneOf(["yes", "no"], { ignoreCase: true }), "Subscribe? "),
    homepage: request(url, "Homepage: "),
  });
  console.log(profile);

  const contact = await record({ email: request(email, "Email: ") });
  console.log(`Will write to ${contact.email}`);
}

main()
  .catch((err) => {
    if (err instanceof StreamError) {
      console.error(`\nInput closed before all answers were given (${err.kind})`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  })
  .finally(close);
