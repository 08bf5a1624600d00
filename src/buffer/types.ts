export interface BufferedTurn {
  readonly role: "user";
  /** Message text as it will be committed, metadata prefix included. */
  readonly content: string;
  readonly timestamp: number;
  readonly senderId: string;
  readonly senderName: string;
  readonly mediaDescription?: string;
}
