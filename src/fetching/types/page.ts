export type SiteType =
  | 'linkedin'
  | 'xing'
  | 'viadeo'
  | 'about_me'
  | 'angel_list'
  | 'crunchbase'
  | 'general'

export interface PageProfile {
  siteType: SiteType
  name: string | null
  title: string | null
  company: string | null
  location: string | null
  description: string | null
}

export interface FetchedPage {
  url: string
  html: string
  profile: PageProfile
}
