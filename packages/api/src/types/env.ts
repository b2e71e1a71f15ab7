export type AppEnv = {
  Variables: {
    requestId: string;
    /** Identity forwarded by the authenticating layer in front of this service. */
    actorId: string | undefined;
  };
};
