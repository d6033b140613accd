import assert from "node:assert/strict"
import test from "node:test"
import { PipelineStageError } from "../../../shared/src/error.js"
import { buildFollowUpPrompt } from "../prompts.js"
import { SessionStore, toChatMessages } from "../session.js"
import { FIXED_NOW, sequentialIds } from "./helpers.js"

function createStore(): SessionStore {
  return new SessionStore({ idFactory: sequentialIds(), now: FIXED_NOW })
}

test("SessionStore.create starts a session with empty history", () => {
  const store = createStore()
  const session = store.create({ originalText: "BP 150/95", summary: "<h2>Medical Summary</h2>" })

  assert.deepEqual(session, {
    id: "session-1",
    originalText: "BP 150/95",
    summary: "<h2>Medical Summary</h2>",
    imagePath: null,
    createdAt: "2026-01-15T09:30:00.000Z",
    history: [],
  })
  assert.equal(store.getActive(), session)
  assert.ok(Object.isFrozen(session))
  assert.ok(Object.isFrozen(session.history))
})

test("SessionStore.create replaces the previous session of the same context", () => {
  const store = createStore()
  const first = store.create({ originalText: "one", summary: "s1" })
  const second = store.create({ originalText: "two", summary: "s2" })
  const other = store.create({ originalText: "three", summary: "s3" }, "other-user")

  assert.equal(store.has(first.id), false)
  assert.equal(store.getActive(), second)
  assert.equal(store.getActive("other-user"), other)
  assert.equal(store.getActive("nobody"), null)
})

test("SessionStore.appendTurn returns a new session and leaves the old one untouched", () => {
  const store = createStore()
  const session = store.create({ originalText: "text", summary: "summary", imagePath: "scan.png" })

  const updated = store.appendTurn(session.id, { question: "Is it serious?", answer: "No." })

  assert.notEqual(updated, session)
  assert.equal(session.history.length, 0)
  assert.deepEqual(updated.history, [{ question: "Is it serious?", answer: "No." }])
  assert.equal(updated.originalText, "text")
  assert.equal(updated.imagePath, "scan.png")
  assert.equal(store.get(session.id), updated)
})

test("SessionStore.get rejects unknown ids", () => {
  const store = createStore()
  assert.throws(
    () => store.get("missing"),
    (error: unknown) => error instanceof PipelineStageError && error.code === "session_not_found",
  )
})

test("toChatMessages flattens turns into alternating roles", () => {
  assert.deepEqual(
    toChatMessages([
      { question: "Q1", answer: "A1" },
      { question: "Q2", answer: "A2" },
    ]),
    [
      { role: "user", content: "Q1" },
      { role: "assistant", content: "A1" },
      { role: "user", content: "Q2" },
      { role: "assistant", content: "A2" },
    ],
  )
})

test("buildFollowUpPrompt grounds the question in text, summary and history", () => {
  const store = createStore()
  const session = store.create({ originalText: "Take lisinopril 10 mg daily.", summary: "Blood pressure medicine." })
  const withTurn = store.appendTurn(session.id, { question: "What is it for?", answer: "Blood pressure." })

  assert.equal(
    buildFollowUpPrompt(withTurn, "When do I take it?"),
    [
      "<medical_text>",
      "Take lisinopril 10 mg daily.",
      "</medical_text>",
      "",
      "<summary_of_text>",
      "Blood pressure medicine.",
      "</summary_of_text>",
      "",
      "<conversation_history>",
      "User: What is it for?",
      "AI: Blood pressure.",
      "</conversation_history>",
      "",
      "<user_question>",
      "When do I take it?",
      "</user_question>",
      "",
      "Provide your answer directly.",
    ].join("\n"),
  )
})
