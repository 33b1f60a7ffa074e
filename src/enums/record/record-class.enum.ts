export enum RecordClassEnum {
  PAGE = "Page",
  BLOG_POST = "BlogPost",
  CUSTOM_CONTENT = "CustomContentEntityObject",
  ATTACHMENT = "Attachment",
  USER = "ConfluenceUserImpl",
  LABEL = "Label",
  CONTENT_PROPERTY = "ContentProperty",
  BODY_CONTENT = "BodyContent",
  LABELLING = "Labelling",
  INTERNAL_USER = "InternalUser",
}
