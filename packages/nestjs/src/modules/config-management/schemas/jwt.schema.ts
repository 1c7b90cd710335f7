import * as Joi from "joi";

export const jwtValidationSchema = Joi.object({
  AUTH_ENABLED: Joi.boolean().sensitive()
    .default(false)
    .description("Require a bearer JWT on the history endpoints"),
  JWT_SECRET: Joi.any()
    .when("AUTH_ENABLED", {
      is: true,
      then: Joi.string().required(),
      otherwise: Joi.string().optional(),
    })
    .description("Secret key for JWT token verification"),
  JWT_ISSUER: Joi.string().optional().description("JWT token issuer"),
  JWT_AUDIENCE: Joi.string().optional().description("JWT token audience"),
});
