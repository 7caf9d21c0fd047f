import test from "node:test";
import assert from "node:assert/strict";
import { RequestValidationError } from "./errors";
import { parseFlightRecordUpload } from "./flightRecords";

test("flight record uploads keep trimmed names and raw content", () => {
  assert.deepEqual(parseFlightRecordUpload([{ name: " flight-1.json ", content: "{\"flights\":[]}" }]), [
    { name: "flight-1.json", content: "{\"flights\":[]}" }
  ]);
});

test("flight record uploads reject bad names and non-JSON content", () => {
  assert.throws(
    () =>
      parseFlightRecordUpload([
        { name: "a.json,b.json", content: "{}" },
        { name: "c.json", content: "{oops" }
      ]),
    (error: unknown) => {
      assert.ok(error instanceof RequestValidationError);
      assert.deepEqual(error.details, [
        { field: "0.name", message: "File name must not contain a comma" },
        { field: "1.content", message: "Flight record is not valid JSON" }
      ]);
      return true;
    }
  );
});

test("empty flight record uploads are rejected", () => {
  assert.throws(() => parseFlightRecordUpload([]), {
    message: "Invalid flight record upload: (root): At least one file is required"
  });
});
