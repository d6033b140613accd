import assert from "node:assert/strict"
import test from "node:test"
import { PipelineStageError, TaskStateError, isPipelineError, toPipelineError, toPipelineStageError } from "../error.js"

const fallback = { code: "generation_error", message: "Generation failed", recoverable: true } as const

test("toPipelineError keeps the message of a plain Error and applies fallback code", () => {
  const normalized = toPipelineError(new Error("image missing"), fallback)
  assert.deepEqual(normalized, {
    code: "generation_error",
    message: "image missing",
    recoverable: true,
    details: undefined,
  })
})

test("toPipelineError uses fallback message for non-error values", () => {
  assert.equal(toPipelineError(42, fallback).message, "Generation failed")
  assert.equal(toPipelineError("boom", fallback).message, "boom")
})

test("toPipelineStageError returns stage errors unchanged", () => {
  const original = new TaskStateError("outcome already consumed")
  assert.equal(toPipelineStageError(original, fallback), original)
})

test("TaskStateError is a non-recoverable pipeline error", () => {
  const error = new TaskStateError("still running")
  assert.ok(error instanceof PipelineStageError)
  assert.equal(error.name, "TaskStateError")
  assert.equal(error.code, "task_state_error")
  assert.equal(error.recoverable, false)
  assert.equal(isPipelineError(error), true)
})

test("isPipelineError rejects unknown codes", () => {
  assert.equal(isPipelineError({ code: "other", message: "x", recoverable: true }), false)
  assert.equal(isPipelineError(null), false)
})
