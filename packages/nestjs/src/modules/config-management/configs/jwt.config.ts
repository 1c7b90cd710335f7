import { registerAs } from "@nestjs/config";

export default registerAs("jwt", () => {
  return {
    enabled: process.env.AUTH_ENABLED === "true",
    secret: process.env.JWT_SECRET,
    issuer: process.env.JWT_ISSUER,
    audience: process.env.JWT_AUDIENCE,
  };
});
