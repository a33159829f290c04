import { put } from "@vercel/blob";

export interface ObjectStore {
  /** Stores `body` under `name` and returns its public URL. */
  upload(name: string, body: Buffer, contentType: string): Promise<string>;
}

export class VercelBlobStore implements ObjectStore {
  constructor(private token: string) {
    if (!token) throw new Error("BLOB_READ_WRITE_TOKEN missing");
  }

  async upload(name: string, body: Buffer, contentType: string): Promise<string> {
    const blob = await put(name, body, {
      access: "public",
      contentType,
      addRandomSuffix: false,
      token: this.token,
    });
    return blob.url;
  }
}
