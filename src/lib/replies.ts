// Customer-facing texts. Customers are served in French.

export const AUDIO_PLACEHOLDER = "[Audio Message]";

export const MISSING_FIELDS_ACK = "Missing user_id or message";

export const APOLOGY_TEXT_TURN = "Désolé, une erreur est survenue. Réessayez dans un instant.";

export const APOLOGY_AUDIO_TURN =
  "Désolé, une erreur est survenue avec le traitement audio. Réessayez plus tard.";

export const APOLOGY_MEDIA_FETCH = "Désolé, je n'ai pas pu récupérer l'audio. Réessayez plus tard.";

export const APOLOGY_API_TURN =
  "Désolé, une erreur est survenue en traitant votre demande. Réessayez dans un instant.";

export const APOLOGY_UNEXPECTED = "Désolé, une erreur inattendue est survenue.";
