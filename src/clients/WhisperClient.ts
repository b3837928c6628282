import axios from "axios";
import FormData from "form-data";
import { inject, injectable } from "tsyringe";
import type { Config } from "../config/config";
import type { AudioUpload } from "../business/models/TurnModel";

@injectable()
export class WhisperClient {
    constructor(@inject("Config") private readonly config: Config) {}

    /** Transcript text, or "" when every credential failed. */
    async transcribe(upload: AudioUpload): Promise<string> {
        const keys = this.config.groqApiKeys;
        for (let i = 0; i < keys.length; i++) {
            try {
                const formData = new FormData();
                formData.append("file", upload.buffer, {
                    filename: upload.filename,
                    contentType: upload.mimeType,
                });
                formData.append("model", this.config.sttModel);

                const response = await axios.post<{ text?: string }>(
                    `${this.config.groqBaseUrl}/audio/transcriptions`,
                    formData,
                    {
                        headers: {
                            ...formData.getHeaders(),
                            Authorization: `Bearer ${keys[i]}`,
                        },
                        timeout: 30_000,
                    }
                );

                return (response.data.text ?? "").trim();
            } catch (error) {
                const status = axios.isAxiosError(error) ? error.response?.status : undefined;
                console.error(`[Whisper] Transcription failed with key #${i + 1} (status=${status ?? "n/a"})`, error);
            }
        }
        return "";
    }
}
