export const MISSION_STATEMENT =
  "The Connecticut RISE Network empowers public high schools with data-driven strategies " +
  "and personalized support to improve student outcomes and promote postsecondary success, " +
  "especially for Black, Latinx, and low-income youth.";
