/**
 * Minimal scanline-editor example.
 *
 * Opens a document, edits it, searches it and prints the colored runs of
 * every visible line.
 */

import { EditorDocument } from '../../core/document/document';
import { MemoryStorage } from '../../core/document/storage';
import { IncrementalSearch } from '../../core/search/incremental';
import { createConsoleLogger } from '../../core/log';
import { computeRenderedLines } from '../../view-model/line-layout';
import { DARK_THEME } from '../../view-model/theme';

// --- Setup ---

const sampleCode = `/* Greeting
   helpers */
fn greet(name: &str) -> usize {
    let count: usize = 42;
    // print it
    println!("Hello, {}!", name);
    count
}
`;

const storage = new MemoryStorage({ 'greet.rs': sampleCode });
const doc = await EditorDocument.open('greet.rs', {
  storage,
  logger: createConsoleLogger('example'),
});

// --- Simulate interaction ---

doc.buffer.insertText({ x: 0, y: doc.buffer.lineCount }, 'let answer = 7;');

const search = new IncrementalSearch(doc.buffer);
const match = search.setQuery('count');

const rendered = computeRenderedLines(
  doc.buffer,
  { firstLine: 0, lineCount: 24, firstColumn: 0, width: 80 },
  DARK_THEME,
  search.highlightWord,
);

// Show the state
console.log(`Document: ${doc.buffer.lineCount} lines (${doc.languageName}), ${DARK_THEME.name} theme`);
console.log(`First match for "${search.query}": ${match ? `${match.y}:${match.x}` : 'none'}`);
for (const line of rendered) {
  const runs = line.tokens.map(t => `[${t.classification} ${t.color}]${t.text}`).join('');
  console.log(`${String(line.lineNumber + 1).padStart(3)} ${runs}`);
}

await doc.save();
console.log(`Saved: ${JSON.stringify(storage.files.get('greet.rs'))}`);
