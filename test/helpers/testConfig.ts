import config, { Config } from "../../src/config/config";

export const makeConfig = (overrides: Partial<Config> = {}): Config => ({
    ...config,
    groqApiKeys: ["test-key-1", "test-key-2"],
    groqModels: ["model-a", "model-b"],
    ...overrides,
});
