import * as os from "node:os";
import * as path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		env: {
			STREAMVIEW_LOG_DIR: path.join(os.tmpdir(), "streamview-test-logs"),
		},
	},
});
