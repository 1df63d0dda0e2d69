import { writeFile } from 'node:fs/promises';
import { ChromePress, networkIdle } from '../src/index.js';

async function main() {
  // Chrome is found and started on first use
  const press = new ChromePress({ headless: true });

  try {
    const pdf = await press.generate('https://example.com', {
      // Wait until the page has stopped loading resources
      waitFor: networkIdle(500),
      print: { printBackground: true, paperWidth: 8.27, paperHeight: 11.69 },
    });
    await writeFile('example.pdf', pdf);
    console.log(`Wrote example.pdf (${pdf.length} bytes)`);
  } finally {
    await press.close();
  }
}

main().catch(console.error);
