import assert from "node:assert/strict"
import test from "node:test"
import { debugLog, debugLogPHI, isDebugEnabled, isPHIDebugEnabled, setLogEnvironment } from "../debug-logger.js"

function captureConsoleLog(run: () => void): unknown[][] {
  const calls: unknown[][] = []
  const original = console.log
  console.log = (...args: unknown[]) => {
    calls.push(args)
  }
  try {
    run()
  } finally {
    console.log = original
  }
  return calls
}

test("debug logging is off unless development or DEBUG_LOGS is set", () => {
  assert.equal(isDebugEnabled({}), false)
  assert.equal(isDebugEnabled({ NODE_ENV: "production" }), false)
  assert.equal(isDebugEnabled({ NODE_ENV: "development" }), true)
  assert.equal(isDebugEnabled({ DEBUG_LOGS: "true" }), true)
})

test("PHI logging needs both the debug switch and the PHI flag", () => {
  assert.equal(isPHIDebugEnabled({ ENABLE_PHI_DEBUG_LOGS: "true" }), false)
  assert.equal(isPHIDebugEnabled({ DEBUG_LOGS: "true" }), false)
  assert.equal(isPHIDebugEnabled({ DEBUG_LOGS: "true", ENABLE_PHI_DEBUG_LOGS: "true" }), true)
})

test("debugLogPHI stays silent when only debug logging is enabled", () => {
  setLogEnvironment({ DEBUG_LOGS: "true" })
  try {
    const calls = captureConsoleLog(() => {
      debugLog("chars:", 12)
      debugLogPHI("text:", "patient has a cough")
    })
    assert.deepEqual(calls, [["chars:", 12]])
  } finally {
    setLogEnvironment(process.env)
  }
})

test("debugLogPHI prefixes output when enabled", () => {
  setLogEnvironment({ DEBUG_LOGS: "true", ENABLE_PHI_DEBUG_LOGS: "true" })
  try {
    const calls = captureConsoleLog(() => {
      debugLogPHI("text:", "abc")
    })
    assert.deepEqual(calls, [["[PHI DEBUG]", "text:", "abc"]])
  } finally {
    setLogEnvironment(process.env)
  }
})
