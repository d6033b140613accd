import assert from "node:assert/strict"
import test from "node:test"
import { TaskStateError } from "../../../shared/src/error.js"
import { pollTask, startTask } from "../task-runner.js"

class ValueError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ValueError"
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}

test("startTask returns before a synchronous function runs", async () => {
  let ran = false
  const handle = startTask(() => {
    ran = true
    return "done"
  })

  assert.equal(ran, false)
  assert.equal(handle.isRunning(), true)

  const value = await pollTask(handle, { intervalMs: 1 })
  assert.equal(ran, true)
  assert.equal(value, "done")
})

test("startTask passes arguments through to the function", async () => {
  const handle = startTask((a: string, b: number) => `${a}-${b}`, "dose", 2)
  assert.equal(await pollTask(handle, { intervalMs: 1 }), "dose-2")
})

test("a raising task reports running, then rethrows the original error", async () => {
  const gate = deferred<void>()
  const original = new ValueError("boom")
  const handle = startTask(async () => {
    await gate.promise
    throw original
  })

  assert.equal(handle.isRunning(), true)
  assert.throws(() => handle.getOutcome(), TaskStateError)

  gate.resolve()
  await assert.rejects(() => pollTask(handle, { intervalMs: 1 }), (error: unknown) => {
    assert.equal(error, original)
    assert.ok(error instanceof ValueError)
    assert.equal(error.message, "boom")
    return true
  })
  assert.equal(handle.isRunning(), false)
})

test("getOutcome delivers the outcome exactly once", async () => {
  const handle = startTask(async () => "summary")
  while (handle.isRunning()) {
    await new Promise((resolve) => setTimeout(resolve, 1))
  }

  assert.deepEqual(handle.peekOutcome(), { status: "success", value: "summary" })
  assert.equal(handle.getOutcome(), "summary")
  assert.equal(handle.peekOutcome(), null)
  assert.throws(() => handle.getOutcome(), /already consumed/)
})

test("pollTask reports progress ticks while the task runs", async () => {
  const gate = deferred<string>()
  const handle = startTask(() => gate.promise)
  const ticks: number[] = []

  const result = pollTask(handle, {
    intervalMs: 1,
    onPoll: (tick) => {
      ticks.push(tick)
      if (tick === 3) gate.resolve("finished")
    },
  })

  assert.equal(await result, "finished")
  assert.deepEqual(ticks, [1, 2, 3])
})
