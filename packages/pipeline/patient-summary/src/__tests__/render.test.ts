import assert from "node:assert/strict"
import test from "node:test"
import {
  SUMMARY_DISCLAIMER,
  SUMMARY_HEADER,
  escapeHtml,
  formatSummary,
  renderSessionNotes,
  renderSummaryFromText,
  sanitizeList,
} from "../render.js"

const PREAMBLE = SUMMARY_HEADER + SUMMARY_DISCLAIMER

test("formatSummary emits only header and disclaimer for empty lists", () => {
  const html = formatSummary({ keyTakeaways: [] })
  assert.equal(html, PREAMBLE)
  assert.equal(html.includes("Key Takeaways"), false)
})

test("formatSummary removes duplicate takeaways keeping first-seen order", () => {
  const html = formatSummary({ keyTakeaways: ["Stop smoking", "Stop smoking", "Drink water"] })
  assert.equal(html, `${PREAMBLE}<h3>📌 Key Takeaways</h3><ul><li>Stop smoking</li><li>Drink water</li></ul>`)
})

test("sanitizeList compares entries after trimming and escaping", () => {
  assert.deepEqual(sanitizeList(["Tom & Jerry", " Tom & Jerry ", "", "   "]), ["Tom &amp; Jerry"])
})

test("formatSummary renders medications with defaults and optional lines", () => {
  const html = formatSummary({
    medications: [{ name: "", dosage: "10 mg" }, { name: "Aspirin", description: "Pain <relief>" }],
  })
  assert.equal(
    html,
    PREAMBLE +
      "<h3>💊 Medications</h3>" +
      "<p><b>• Unknown</b></p>" +
      '<p style="margin-left: 20px;">- Dosage: 10 mg</p>' +
      "<p><b>• Aspirin</b></p>" +
      '<p style="margin-left: 20px;"><i>Pain &lt;relief&gt;</i></p>' +
      "<p><br></p>",
  )
})

test("formatSummary renders administration instructions", () => {
  const html = formatSummary({ medications: [{ name: "Metformin", administration: "With meals" }] })
  assert.ok(html.includes('<p style="margin-left: 20px;">- How to take: With meals</p>'))
})

test("formatSummary renders terms with placeholder defaults", () => {
  const html = formatSummary({ medicalTerms: [{ term: "Hypertension" }, { definition: "Swelling" }] })
  assert.equal(
    html,
    `${PREAMBLE}<h3>📖 Terms Explained</h3><p><b>Hypertension</b>: N/A</p><p><b>Unknown</b>: Swelling</p><p><br></p>`,
  )
})

test("formatSummary renders questions as an ordered list", () => {
  const html = formatSummary({ questionsForProvider: ["Is it serious?"] })
  assert.equal(html, `${PREAMBLE}<h3>❓ Questions for Provider</h3><ol><li>Is it serious?</li></ol><p><br></p>`)
})

test("formatSummary keeps section order independent of input key order", () => {
  const html = formatSummary({
    questionsForProvider: ["Q"],
    medicalTerms: [{ term: "T", definition: "D" }],
    medications: [{ name: "M" }],
    keyTakeaways: ["K"],
  })
  const positions = ["Key Takeaways", "Medications", "Terms Explained", "Questions for Provider"].map((heading) =>
    html.indexOf(heading),
  )
  assert.ok(positions.every((position) => position > 0))
  assert.deepEqual([...positions].sort((a, b) => a - b), positions)
})

test("formatSummary is deterministic", () => {
  const summary = { keyTakeaways: ["Rest"], questionsForProvider: ["When can I run?"] }
  assert.equal(formatSummary(summary), formatSummary(summary))
})

test("escapeHtml escapes markup characters and quotes", () => {
  assert.equal(escapeHtml(`<a href="x">'&'</a>`), "&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;")
})

test("renderSummaryFromText formats structured output", () => {
  const raw = 'Sure.\n```json\n{"key_takeaways": ["Rest"]}\n```'
  assert.equal(renderSummaryFromText(raw), `${PREAMBLE}<h3>📌 Key Takeaways</h3><ul><li>Rest</li></ul>`)
})

test("renderSummaryFromText returns raw text when no structure is found", () => {
  const raw = "The model answered in prose only."
  assert.equal(renderSummaryFromText(raw), raw)
})

test("renderSessionNotes shows only the summary when there is no conversation", () => {
  assert.equal(renderSessionNotes("", []), "<h2>Summary</h2><p>No summary available.</p>")
})

test("renderSessionNotes labels each message with its role", () => {
  const html = renderSessionNotes("S", [
    { role: "user", content: "Why?" },
    { role: "assistant", content: "a < b" },
  ])
  assert.equal(
    html,
    "<h2>Summary</h2><p>S</p><h2>Follow-up Conversation</h2>" +
      "<p><strong>User:</strong> Why?</p>" +
      "<p><strong>Assistant:</strong> a &lt; b</p>",
  )
})
