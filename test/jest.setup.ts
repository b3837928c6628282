process.env.GROQ_API_KEY = process.env.GROQ_API_KEY || "test-groq-key";
process.env.ELEVENLABS_API_KEY = process.env.ELEVENLABS_API_KEY || "test-elevenlabs-key";
process.env.LIVEKIT_API_KEY = process.env.LIVEKIT_API_KEY || "test-livekit-key";
process.env.LIVEKIT_API_SECRET = process.env.LIVEKIT_API_SECRET || "test-livekit-secret";
