import { writeFile } from 'node:fs/promises';
import { ChromePress, customPredicate, elementVisible } from '../src/index.js';

const html = `<!doctype html>
<html>
  <head><link rel="stylesheet" href="styles/report.css"></head>
  <body>
    <h1>Monthly report</h1>
    <div id="chart"></div>
    <script>
      setTimeout(() => {
        document.getElementById('chart').textContent = 'rendered';
        window.chartReady = true;
      }, 300);
    </script>
  </body>
</html>`;

async function main() {
  const press = new ChromePress({ noSandbox: true, disableDevShmUsage: true });

  try {
    // Relative URLs in the markup resolve against baseUrl
    await press.navigate({ html, baseUrl: 'https://example.com/reports/' });

    // Step by step: wait for the element, then for a script flag
    await press.awaitReady(elementVisible('#chart'), 5_000);
    await press.awaitReady(customPredicate('window.chartReady === true'), 5_000);

    const pdf = await press.render({ landscape: true, printBackground: true });
    await writeFile('report.pdf', pdf);
    console.log(`Wrote report.pdf (${pdf.length} bytes)`);
  } finally {
    await press.close();
  }
}

main().catch(console.error);
