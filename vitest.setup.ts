import "@testing-library/jest-dom/vitest";
import { afterEach } from "vitest";
import { clearLogBuffer, setLogLevel } from "./utils/logger";

// Keep test output to warnings and errors.
setLogLevel("warn");

afterEach(async () => {
  clearLogBuffer();
  if (typeof document !== "undefined") {
    const { cleanup } = await import("@testing-library/react");
    cleanup();
  }
});
