import type { z } from "zod";
import type { addGpgKeySchema } from "./schemas.js";

export type AddGpgKeyInput = z.infer<typeof addGpgKeySchema>;

export interface Capabilities {
  canSign: boolean;
  canEncryptComms: boolean;
  canEncryptStorage: boolean;
  canCertify: boolean;
}
